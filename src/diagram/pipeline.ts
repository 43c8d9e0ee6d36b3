import {assembleDiagram} from './assembler.js'
import {EntityCollector} from './entity-collector.js'
import {renderDiagram} from './renderer.js'

import type {DiagramOptions} from './options.js'
import type {DiagramEntity, SourceUnit} from '../types.js'

export type ClassDiagramResult = {
    entities: DiagramEntity[]
    diagram: string
}

export function collectEntities(
    units: readonly SourceUnit[],
    options: Pick<DiagramOptions, 'nestedInheritance'>,
): readonly DiagramEntity[] {
    const collector = new EntityCollector({nestedInheritance: options.nestedInheritance})
    units.forEach((unit) => collector.addSourceUnit(unit))
    return collector.build()
}

/**
 * 타입 설명들 → 엔티티 → 필터 → mermaid 텍스트
 */
export function generateClassDiagram(
    units: readonly SourceUnit[],
    options: DiagramOptions,
    title?: string,
): ClassDiagramResult {
    const entities = assembleDiagram(collectEntities(units, options), options)

    return {
        entities,
        diagram: renderDiagram(entities, {groupByNamespace: options.groupByNamespace, title}),
    }
}
