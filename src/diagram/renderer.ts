import {
    getLinkToken,
    getRelationshipContext,
    getRelationshipToken,
    getStereotypeLabel,
    getVisibilityToken,
} from './mappings.js'

import type {DiagramEntity, DiagramMember, DiagramMethod, DiagramRelationship} from '../types.js'

export const DEFAULT_DIAGRAM_TITLE = 'UML Diagram'

const INDENT = '    '

export type DiagramLayout = 'flat' | 'namespaced'

export type RenderOptions = {
    groupByNamespace: boolean
    title?: string
}

export function formatProperty(property: DiagramMember): string {
    return `${getVisibilityToken(property.visibility)} ${property.type} ${property.name}`
}

export function formatMethod(method: DiagramMethod): string {
    const asyncPrefix = method.isAsync ? 'async ' : ''
    const parameters = method.parameters.join(', ')
    return `${getVisibilityToken(method.visibility)} ${asyncPrefix}${method.returnType} ${method.name}(${parameters})`
}

export function formatRelationship(relationship: DiagramRelationship): string {
    const link = getLinkToken(relationship.kind)
    const rel = getRelationshipToken(relationship.kind)
    return `${relationship.from} ${link}${rel} ${relationship.to} : ${getRelationshipContext(relationship.kind)}`
}

export function formatStereotype(entity: DiagramEntity): string {
    if (entity.isAbstract && entity.kind === 'Class') {
        return `<<abstract>> ${entity.name}`
    }
    return `<<${getStereotypeLabel(entity.kind)}>> ${entity.name}`
}

/**
 * 네임스페이스 블록 이름. mermaid 식별자에 쓸 수 없는 구분자는 '-'로 바꾼다
 */
export function getNamespaceKey(namespace: string | null): string | null {
    if (!namespace || !namespace.trim()) {
        return null
    }
    return namespace.replace(/[./\\]/g, '-')
}

function renderClassBlock(entity: DiagramEntity, depth: number): string[] {
    const indent = INDENT.repeat(depth)
    const memberIndent = INDENT.repeat(depth + 1)

    return [
        `${indent}class ${entity.name} {`,
        ...entity.properties.map((property) => `${memberIndent}${formatProperty(property)}`),
        ...entity.methods.map((method) => `${memberIndent}${formatMethod(method)}`),
        `${indent}}`,
    ]
}

function renderRelationships(entity: DiagramEntity): string[] {
    return entity.relationships.map((relationship) => `${INDENT}${formatRelationship(relationship)}`)
}

/**
 * 네임스페이스가 없는 그룹이 먼저, 나머지는 키 순서대로
 */
export function groupByNamespace(entities: readonly DiagramEntity[]): Array<[string | null, DiagramEntity[]]> {
    const groups = new Map<string | null, DiagramEntity[]>()
    entities.forEach((entity) => {
        const key = getNamespaceKey(entity.namespace)
        const group = groups.get(key)
        if (group) {
            group.push(entity)
        } else {
            groups.set(key, [entity])
        }
    })

    return [...groups.entries()].sort(([a], [b]) => {
        if (a === b) return 0
        if (a === null) return -1
        if (b === null) return 1
        return a < b ? -1 : 1
    })
}

const layouts: Record<DiagramLayout, (entities: readonly DiagramEntity[]) => string[]> = {
    flat: (entities) =>
        entities.flatMap((entity) => [
            ...renderClassBlock(entity, 1),
            `${INDENT}${formatStereotype(entity)}`,
            ...renderRelationships(entity),
        ]),

    // mermaid는 namespace 블록이 주석/관계 문장보다 먼저 나와야 한다
    namespaced: (entities) => [
        ...groupByNamespace(entities).flatMap(([key, group]) =>
            key === null
                ? group.flatMap((entity) => renderClassBlock(entity, 1))
                : [
                      `${INDENT}namespace ${key} {`,
                      ...group.flatMap((entity) => renderClassBlock(entity, 2)),
                      `${INDENT}}`,
                  ],
        ),
        '',
        ...entities.map((entity) => `${INDENT}${formatStereotype(entity)}`),
        '',
        ...entities.flatMap(renderRelationships),
    ],
}

export function renderDiagram(entities: readonly DiagramEntity[], options: RenderOptions): string {
    const layout: DiagramLayout = options.groupByNamespace ? 'namespaced' : 'flat'
    const title = options.title ?? entities[0]?.name ?? DEFAULT_DIAGRAM_TITLE

    const lines = [
        '```mermaid',
        '---',
        `title: ${title}`,
        'config:',
        '  class:',
        '    hideEmptyMembersBox: true',
        '---',
        'classDiagram',
        ...layouts[layout](entities),
        '```',
    ]

    return `${lines.join('\n')}\n`
}
