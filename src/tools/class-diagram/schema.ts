import {z} from 'zod'

import {diagramOptionsSchema} from '../../diagram/options.js'

export const classInputSchema = diagramOptionsSchema.extend({
    projectPath: z
        .string()
        .describe('Absolute path to project directory (Automatically detected when using vscode with copilot)')
        .optional(),
    excludePatterns: z
        .array(z.string())
        .optional()
        .describe('Glob patterns to exclude files or directories (e.g., "**/test/**", "**/*.spec.*")')
        .default(['**/test/**', '**/spec/**', '**/__tests__/**', '**/stories/**', '**/*.test.*', '**/*.spec.*']),
    outputDir: z
        .string()
        .describe('Directory to save the diagram markdown file into (not saved when omitted)')
        .optional(),
    title: z.string().describe('Diagram title (defaults to the first type name)').optional(),
})
export type ClassInputSchema = z.infer<typeof classInputSchema>
