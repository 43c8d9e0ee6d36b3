import {buildEntity, buildEnumEntity} from './entity-builder.js'
import {inferRelationships, type InferenceOptions} from './relationship-inferencer.js'

import type {DiagramEntity, EnumDescription, SourceUnit, TypeDescription} from '../types.js'

/**
 * 여러 소스 파일에서 만든 엔티티를 처음 본 순서대로 모은다
 */
export class EntityCollector {
    private entities: DiagramEntity[] = []

    constructor(private options: InferenceOptions) {}

    addType(description: TypeDescription): this {
        this.entities.push(inferRelationships(buildEntity(description), description, this.options))
        return this
    }

    addEnum(description: EnumDescription): this {
        this.entities.push(buildEnumEntity(description))
        return this
    }

    /**
     * 파일 단위로 클래스/인터페이스를 먼저, 그다음 enum을 넣는다
     */
    addSourceUnit(unit: SourceUnit): this {
        unit.types.forEach((description) => this.addType(description))
        unit.enums.forEach((description) => this.addEnum(description))
        return this
    }

    build(): readonly DiagramEntity[] {
        return Object.freeze([...this.entities])
    }
}
