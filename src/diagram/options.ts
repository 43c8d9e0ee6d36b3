import {z} from 'zod'

export const diagramOptionsSchema = z.object({
    excludeClasses: z.boolean().describe('Leave classes out of the diagram').default(false),
    excludeInterfaces: z.boolean().describe('Leave interfaces out of the diagram').default(false),
    excludeEnums: z.boolean().describe('Leave enums out of the diagram').default(false),
    nestedInheritance: z
        .boolean()
        .describe('Draw an inheritance edge to every ancestor instead of the direct base class only')
        .default(false),
    groupByNamespace: z.boolean().describe('Group classes into namespace blocks').default(false),
})
export type DiagramOptions = z.infer<typeof diagramOptionsSchema>

export const DEFAULT_DIAGRAM_OPTIONS: DiagramOptions = diagramOptionsSchema.parse({})
