import {classDiagramTool} from './class-diagram/index.js'
import {createListToolsTool} from './list-tools/index.js'
import {ToolRegistry, type ToolDefinition} from './registry.js'
import {renderDiagramTool} from './render-diagram/index.js'

/**
 * 다이어그램 도구들 (분석해서 그리기, JSON에서 바로 그리기)
 */
export const DIAGRAM_TOOLS: ToolDefinition[] = [classDiagramTool, renderDiagramTool]

export function createToolRegistry(tools: ToolDefinition[] = DIAGRAM_TOOLS): ToolRegistry {
    const registry = new ToolRegistry()

    tools.forEach((tool) => registry.register(tool))

    // list-tools는 마지막에 등록해야 다른 도구들을 모두 보여준다
    registry.register(createListToolsTool(registry))

    return registry
}
