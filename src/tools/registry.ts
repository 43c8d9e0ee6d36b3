import type {FastMCP} from 'fastmcp'
import type {z} from 'zod'

export interface ToolDefinition {
    name: string
    description: string
    parameters: z.AnyZodObject
    /**
     * 서버에 실제 핸들러를 등록한다 (파라미터 타입이 구체적인 곳에서 등록해야 타입이 맞는다)
     */
    addTo: (server: FastMCP) => void
}

export type ToolMetadata = {
    name: string
    description: string
    parameters: Array<{
        name: string
        description: string
        required: boolean
        type: string
    }>
}

export class ToolRegistry {
    private tools: ToolDefinition[] = []

    register(tool: ToolDefinition): void {
        if (this.tools.some((registered) => registered.name === tool.name)) {
            throw new Error(`Tool "${tool.name}" is already registered`)
        }
        this.tools.push(tool)
    }

    registerAll(server: FastMCP): void {
        for (const tool of this.tools) {
            tool.addTo(server)
        }
    }

    getToolsMetadata(): ToolMetadata[] {
        return this.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: Object.entries<z.ZodTypeAny>(tool.parameters.shape).map(([key, schema]) => ({
                name: key,
                description: schema.description || '',
                required: !schema.isOptional(),
                type: String(schema._def?.typeName ?? 'unknown'),
            })),
        }))
    }
}
