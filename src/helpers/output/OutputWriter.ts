import fs from 'fs/promises'
import path from 'path'

import type {DiagramOptions} from '../../diagram/options.js'

/**
 * 옵션이 켜진 순서대로 접미사를 붙인다 (e.g., "Zoo_NoEnums_WithNamespaces.md")
 */
export function buildOutputFileName(projectName: string, options: DiagramOptions): string {
    const suffixes = [
        options.excludeClasses && '_NoClasses',
        options.excludeInterfaces && '_NoInterfaces',
        options.excludeEnums && '_NoEnums',
        options.nestedInheritance && '_NestedInheritance',
        options.groupByNamespace && '_WithNamespaces',
    ].filter((suffix): suffix is string => typeof suffix === 'string')

    return `${projectName}${suffixes.join('')}.md`
}

export async function writeDiagram(outputDir: string, fileName: string, diagram: string): Promise<string> {
    const outputPath = path.join(outputDir, fileName)
    try {
        await fs.mkdir(outputDir, {recursive: true})
        await fs.writeFile(outputPath, diagram, 'utf-8')
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        throw new Error(`Failed to write diagram to ${outputPath}: ${message}`)
    }
    return outputPath
}
