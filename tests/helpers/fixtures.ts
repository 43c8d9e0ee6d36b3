import type {EnumDescription, PropertyDescription, TypeDescription, TypeReference} from '../../src/types.js'

export function projectRef(name: string, overrides: Partial<TypeReference> = {}): TypeReference {
    return {
        name,
        namespace: 'Zoo',
        kind: 'class',
        elementType: null,
        typeArguments: [],
        interfaces: [],
        ...overrides,
    }
}

export function systemRef(name: string, overrides: Partial<TypeReference> = {}): TypeReference {
    return projectRef(name, {namespace: 'System', kind: 'primitive', ...overrides})
}

export function arrayOf(element: TypeReference): TypeReference {
    return systemRef('Array', {kind: 'class', elementType: element})
}

export function listOf(argument: TypeReference): TypeReference {
    return systemRef('List', {kind: 'class', typeArguments: [argument], interfaces: ['IEnumerable', 'ICollection']})
}

export function property(name: string, type: TypeReference): PropertyDescription {
    return {name, type, accessibility: 'public'}
}

export function classType(name: string, overrides: Partial<TypeDescription> = {}): TypeDescription {
    return {
        name,
        kind: 'class',
        isAbstract: false,
        accessibility: 'public',
        namespace: 'Zoo',
        baseType: null,
        ancestors: [],
        interfaces: [],
        properties: [],
        methods: [],
        ...overrides,
    }
}

export function interfaceType(name: string, overrides: Partial<TypeDescription> = {}): TypeDescription {
    return classType(name, {kind: 'interface', ...overrides})
}

export function enumType(name: string, members: string[], namespace: string | null = null): EnumDescription {
    return {name, members, namespace}
}
