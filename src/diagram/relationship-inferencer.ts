import {isCollectionType} from './entity-builder.js'

import type {
    DiagramEntity,
    DiagramRelationship,
    LinkStyle,
    RelationshipKind,
    TypeDescription,
    TypeReference,
} from '../types.js'

/**
 * 모든 타입의 최상위 루트. 상속 관계의 대상이 되지 않는다
 */
export const ROOT_TYPE_NAME = 'Object'

/**
 * 이 접두사로 시작하는 네임스페이스의 타입은 관계를 만들지 않는다 (기본 타입, 라이브러리 타입)
 */
export const SYSTEM_NAMESPACE_PREFIX = 'System'

export type InferenceOptions = {
    nestedInheritance: boolean
}

/**
 * 엔티티 하나의 관계 목록을 모으는 빌더. (from, to, kind)가 같은 관계는 한 번만 들어간다
 */
export class RelationshipSetBuilder {
    private relationships: DiagramRelationship[] = []
    private keys = new Set<string>()

    add(from: string, to: string, kind: RelationshipKind, linkStyle: LinkStyle): this {
        const key = `${from}\u0000${to}\u0000${kind}`
        if (!this.keys.has(key)) {
            this.keys.add(key)
            this.relationships.push({from, to, kind, linkStyle})
        }
        return this
    }

    build(): readonly DiagramRelationship[] {
        return Object.freeze(this.relationships.map((relationship) => Object.freeze({...relationship})))
    }
}

/**
 * 속성 타입에서 관계 대상 타입을 고른다. 배열이면 원소 타입, 인자가 하나인 제네릭이면 그 인자
 */
export function resolveTargetType(type: TypeReference): TypeReference {
    if (type.elementType) {
        return type.elementType
    }

    if (type.typeArguments.length === 1) {
        return type.typeArguments[0]
    }

    return type
}

export function isSystemType(type: TypeReference): boolean {
    return type.namespace?.startsWith(SYSTEM_NAMESPACE_PREFIX) === true
}

function classifyMemberRelationship(propertyType: TypeReference, target: TypeReference): RelationshipKind {
    if (target.kind === 'enum') {
        return 'Dependency'
    }
    return isCollectionType(propertyType) ? 'Aggregation' : 'Association'
}

export function inferRelationships(
    entity: DiagramEntity,
    description: TypeDescription,
    options: InferenceOptions,
): DiagramEntity {
    const builder = new RelationshipSetBuilder()

    // 상속 관계
    const parents = options.nestedInheritance
        ? description.ancestors
        : description.baseType
          ? [description.baseType]
          : []
    parents
        .filter((parent) => parent !== ROOT_TYPE_NAME)
        .forEach((parent) => builder.add(entity.name, parent, 'Inheritance', 'Solid'))

    // 구현 관계 (인터페이스끼리는 상속)
    description.interfaces.forEach((iface) => {
        builder.add(entity.name, iface, entity.kind === 'Interface' ? 'Inheritance' : 'Realization', 'Dashed')
    })

    // 속성 타입에서 나오는 연관, 집합, 의존 관계
    description.properties.forEach((property) => {
        const target = resolveTargetType(property.type)
        if (isSystemType(target)) {
            return
        }

        const kind = classifyMemberRelationship(property.type, target)

        // 집합 관계는 원소 타입에서 컨테이너 쪽으로 향한다
        if (kind === 'Aggregation') {
            builder.add(target.name, entity.name, kind, 'Solid')
        } else {
            builder.add(entity.name, target.name, kind, 'Solid')
        }
    })

    return {...entity, relationships: builder.build()}
}
