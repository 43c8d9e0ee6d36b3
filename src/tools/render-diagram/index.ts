/* eslint-disable no-console */
import {renderInputSchema, type RenderInputSchema} from './schema.js'
import {generateClassDiagram} from '../../diagram/pipeline.js'

import type {ToolDefinition} from '../registry.js'

const name = 'render-class-diagram'
const description = 'Render a mermaid class diagram from a JSON description of classes, interfaces and enums'

export async function executeRenderDiagram(params: RenderInputSchema): Promise<string> {
    console.error(`Rendering ${params.types.length} types and ${params.enums.length} enums...`)

    const {diagram} = generateClassDiagram([{types: params.types, enums: params.enums}], params, params.title)
    return diagram
}

export const renderDiagramTool: ToolDefinition = {
    name,
    description,
    parameters: renderInputSchema,
    addTo: (server) => server.addTool({name, description, parameters: renderInputSchema, execute: executeRenderDiagram}),
}
