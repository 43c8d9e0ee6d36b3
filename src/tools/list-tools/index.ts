import {z} from 'zod'

import type {ToolDefinition, ToolMetadata, ToolRegistry} from '../registry.js'

export function formatToolsMetadata(toolsMetadata: ToolMetadata[]): string {
    return `# Available Tools in mermaid-uml-mcp

${toolsMetadata
    .map(
        (tool) => `## ${tool.name}

**Description:** ${tool.description}

**Parameters:**
${
    tool.parameters.length > 0
        ? tool.parameters
              .map((param) => `- \`${param.name}\` (${param.required ? 'required' : 'optional'}): ${param.description}`)
              .join('\n')
        : 'No parameters required'
}
`,
    )
    .join('\n---\n\n')}
## How to use

Each tool can be called with the specified parameters. Use the tool name and provide the required parameters to execute the tool.
`
}

export function createListToolsTool(registry: ToolRegistry): ToolDefinition {
    const name = 'list-tools'
    const description = 'List all available tools and their descriptions'
    const parameters = z.object({})

    return {
        name,
        description,
        parameters,
        addTo: (server) =>
            server.addTool({
                name,
                description,
                parameters,
                execute: async () => formatToolsMetadata(registry.getToolsMetadata()),
            }),
    }
}
