import z from 'zod'

export interface ServerConfig {
    /**
     * 설정되면 generate-class-diagram 결과를 이 디렉터리에 파일로 저장한다
     */
    outputDir?: string
    /**
     * 모든 분석에 추가로 적용할 제외 패턴
     */
    excludePatterns: string[]
}

const ServerConfigSchema = z.object({
    outputDir: z.string().min(1, 'Output directory must not be empty').optional(),
    excludePatterns: z.array(z.string().min(1, 'Exclude pattern must not be empty')).default([]),
})

export function getServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    try {
        const excludes = env.MERMAID_UML_EXCLUDE_PATTERNS
        return ServerConfigSchema.parse({
            outputDir: env.MERMAID_UML_OUTPUT_DIR || undefined,
            excludePatterns: excludes ? excludes.split(',').map((pattern) => pattern.trim()) : undefined,
        })
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map((issue) => {
                switch (issue.path[0]) {
                    case 'outputDir':
                        return `Output directory: ${issue.message}. Check MERMAID_UML_OUTPUT_DIR...`
                    case 'excludePatterns':
                        return `Exclude patterns: ${issue.message}. Use a comma separated list in MERMAID_UML_EXCLUDE_PATTERNS...`
                    default:
                        return `Configuration error at ${issue.path.join('.')}: ${issue.message}`
                }
            })

            throw new Error(`Server configuration error:\n${issues.join('\n')}`)
        }
        throw error
    }
}
