import type {Accessibility, EntityKind, RelationshipKind, Visibility} from '../types.js'

const VISIBILITY_BY_ACCESSIBILITY: Record<Accessibility, Visibility> = {
    public: 'Public',
    private: 'Private',
    protected: 'Protected',
    internal: 'Internal',
    protectedOrInternal: 'ProtectedOrInternal',
    notApplicable: 'Unknown',
}

const VISIBILITY_TOKENS: Record<Visibility, string> = {
    Public: '+',
    Private: '-',
    Protected: '#',
    Internal: '~',
    ProtectedOrInternal: '~',
    Unknown: '?',
}

const RELATIONSHIP_TOKENS: Record<RelationshipKind, string> = {
    Inheritance: '|>',
    Composition: '*',
    Aggregation: 'o',
    Association: '>',
    Realization: '|>',
    Dependency: '>',
    Link: '',
}

const LINK_TOKENS: Record<RelationshipKind, '--' | '..'> = {
    Inheritance: '--',
    Composition: '--',
    Aggregation: '--',
    Association: '--',
    Realization: '..',
    Dependency: '..',
    Link: '..',
}

const RELATIONSHIP_CONTEXTS: Record<RelationshipKind, string> = {
    Inheritance: 'inherits',
    Composition: 'composes',
    Aggregation: 'aggregates',
    Association: 'associates',
    Realization: 'realizes',
    Dependency: 'depends on',
    Link: 'links',
}

const STEREOTYPE_LABELS: Record<EntityKind, string> = {
    Class: 'Class',
    Interface: 'Interface',
    Enum: 'Enum',
}

export function toVisibility(accessibility: Accessibility): Visibility {
    return VISIBILITY_BY_ACCESSIBILITY[accessibility] ?? 'Unknown'
}

export function getVisibilityToken(visibility: Visibility): string {
    return VISIBILITY_TOKENS[visibility]
}

export function getRelationshipToken(kind: RelationshipKind): string {
    return RELATIONSHIP_TOKENS[kind]
}

/**
 * 선 모양은 관계 종류로만 결정된다 (linkStyle은 참고용)
 */
export function getLinkToken(kind: RelationshipKind): string {
    return LINK_TOKENS[kind]
}

export function getRelationshipContext(kind: RelationshipKind): string {
    return RELATIONSHIP_CONTEXTS[kind]
}

export function getStereotypeLabel(kind: EntityKind): string {
    return STEREOTYPE_LABELS[kind]
}
