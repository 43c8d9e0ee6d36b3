/**
 * 분석 프런트엔드가 넘겨주는 타입 계약과 다이어그램 모델
 */

export type Accessibility = 'public' | 'private' | 'protected' | 'internal' | 'protectedOrInternal' | 'notApplicable'

export type DeclaredTypeKind = 'class' | 'interface'

/**
 * 참조되는 타입의 종류 (알 수 없으면 null)
 */
export type ReferenceKind = 'class' | 'interface' | 'enum' | 'primitive' | 'typeParameter'

export type TypeReference = {
    /**
     * 단순 이름 (네임스페이스 제외, 제네릭 인자 제외)
     */
    name: string
    namespace: string | null
    kind: ReferenceKind | null
    /**
     * 배열이면 원소 타입
     */
    elementType: TypeReference | null
    typeArguments: TypeReference[]
    /**
     * 구현하거나 확장하는 모든 인터페이스 이름
     */
    interfaces: string[]
}

export type PropertyDescription = {
    name: string
    type: TypeReference
    accessibility: Accessibility
}

export type MethodDescription = {
    name: string
    returnType: TypeReference
    accessibility: Accessibility
    parameters: {name: string; type: TypeReference}[]
    isAsync: boolean
}

export type TypeDescription = {
    name: string
    kind: DeclaredTypeKind
    isAbstract: boolean
    accessibility: Accessibility
    namespace: string | null
    /**
     * 직접 상속하는 부모 타입 (없으면 null)
     */
    baseType: string | null
    /**
     * 가까운 부모부터 순서대로 나열한 조상 타입들
     */
    ancestors: string[]
    /**
     * 직접 구현(인터페이스는 확장)하는 인터페이스들
     */
    interfaces: string[]
    properties: PropertyDescription[]
    methods: MethodDescription[]
}

export type EnumDescription = {
    name: string
    members: string[]
    namespace: string | null
}

/**
 * 소스 파일 하나에서 선언된 타입들
 */
export type SourceUnit = {
    types: TypeDescription[]
    enums: EnumDescription[]
}

export type Visibility = 'Public' | 'Private' | 'Protected' | 'Internal' | 'ProtectedOrInternal' | 'Unknown'

export type EntityKind = 'Class' | 'Interface' | 'Enum'

export type RelationshipKind =
    | 'Inheritance'
    | 'Composition'
    | 'Aggregation'
    | 'Association'
    | 'Dependency'
    | 'Realization'
    | 'Link'

export type LinkStyle = 'Solid' | 'Dashed'

export type DiagramMember = {
    name: string
    type: string
    visibility: Visibility
    isCollection: boolean
}

export type DiagramMethod = {
    name: string
    returnType: string
    visibility: Visibility
    parameters: string[]
    isAsync: boolean
}

export type DiagramRelationship = {
    from: string
    to: string
    kind: RelationshipKind
    linkStyle: LinkStyle
}

export type DiagramEntity = {
    name: string
    kind: EntityKind
    isAbstract: boolean
    visibility: Visibility
    namespace: string | null
    properties: readonly DiagramMember[]
    methods: readonly DiagramMethod[]
    relationships: readonly DiagramRelationship[]
}
