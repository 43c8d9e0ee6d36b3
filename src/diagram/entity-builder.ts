import {toVisibility} from './mappings.js'

import type {
    DiagramEntity,
    DiagramMember,
    DiagramMethod,
    EnumDescription,
    MethodDescription,
    PropertyDescription,
    TypeDescription,
    TypeReference,
} from '../types.js'

/**
 * 컬렉션으로 보는 타입 이름들
 */
export const COLLECTION_TYPE_NAMES = [
    'IEnumerable',
    'ICollection',
    'List',
    'Array',
    'ReadonlyArray',
    'Set',
    'ReadonlySet',
    'Map',
    'ReadonlyMap',
    'Iterable',
]

/**
 * 구현하고 있으면 컬렉션으로 보는 인터페이스 이름들
 */
export const COLLECTION_INTERFACE_NAMES = ['IEnumerable', 'ICollection', 'Iterable']

export const ENUM_MEMBER_TYPE = 'enum'

export function isCollectionType(type: TypeReference): boolean {
    // string은 Iterable이지만 컬렉션이 아니다
    if (type.name.toLowerCase() === 'string') {
        return false
    }

    if (type.elementType) {
        return true
    }

    return (
        COLLECTION_TYPE_NAMES.includes(type.name) ||
        type.interfaces.some((name) => COLLECTION_INTERFACE_NAMES.includes(name))
    )
}

/**
 * 다이어그램에 표시할 타입 문자열 (e.g., "List<Toy>", "Toy[]")
 */
export function getTypeDisplayName(type: TypeReference): string {
    if (type.elementType) {
        return `${type.elementType.name}[]`
    }

    if (type.typeArguments.length > 0) {
        return `${type.name}<${type.typeArguments.map((arg) => arg.name).join(', ')}>`
    }

    return type.name
}

function buildMember(property: PropertyDescription): DiagramMember {
    return {
        name: property.name,
        type: getTypeDisplayName(property.type),
        visibility: toVisibility(property.accessibility),
        isCollection: isCollectionType(property.type),
    }
}

function buildMethod(method: MethodDescription): DiagramMethod {
    return {
        name: method.name,
        returnType: method.returnType.name,
        visibility: toVisibility(method.accessibility),
        parameters: method.parameters.map((param) => `${param.type.name} ${param.name}`),
        isAsync: method.isAsync,
    }
}

function normalizeNamespace(namespace: string | null): string | null {
    return namespace && namespace.trim() ? namespace : null
}

export function buildEntity(description: TypeDescription): DiagramEntity {
    return {
        name: description.name,
        kind: description.kind === 'interface' ? 'Interface' : 'Class',
        isAbstract: description.isAbstract,
        visibility: toVisibility(description.accessibility),
        namespace: normalizeNamespace(description.namespace),
        properties: description.properties.map(buildMember),
        methods: description.methods.map(buildMethod),
        relationships: [],
    }
}

/**
 * enum 멤버는 "enum" 타입의 public 속성으로 표시한다
 */
export function buildEnumEntity(description: EnumDescription): DiagramEntity {
    return {
        name: description.name,
        kind: 'Enum',
        isAbstract: false,
        visibility: 'Public',
        namespace: normalizeNamespace(description.namespace),
        properties: description.members.map((member) => ({
            name: member,
            type: ENUM_MEMBER_TYPE,
            visibility: 'Public',
            isCollection: false,
        })),
        methods: [],
        relationships: [],
    }
}
