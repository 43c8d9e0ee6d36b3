import type {DiagramOptions} from './options.js'
import type {DiagramEntity} from '../types.js'

export type AssemblyFilters = Pick<DiagramOptions, 'excludeClasses' | 'excludeInterfaces' | 'excludeEnums'>

/**
 * 제외 옵션에 걸리는 종류의 엔티티만 빼고 순서를 유지한다.
 * 빠진 엔티티를 가리키는 관계는 그대로 남는다
 */
export function assembleDiagram(entities: readonly DiagramEntity[], filters: AssemblyFilters): DiagramEntity[] {
    return entities.filter(
        (entity) =>
            !(filters.excludeClasses && entity.kind === 'Class') &&
            !(filters.excludeInterfaces && entity.kind === 'Interface') &&
            !(filters.excludeEnums && entity.kind === 'Enum'),
    )
}
