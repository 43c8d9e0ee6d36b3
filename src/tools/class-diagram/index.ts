/* eslint-disable no-console */
import {classInputSchema, type ClassInputSchema} from './schema.js'
import {analyzeProject} from './type-analyzer.js'
import {generateClassDiagram} from '../../diagram/pipeline.js'
import {getServerConfigFromEnv, type ServerConfig} from '../../helpers/configs/server-config.js'
import {getProjectName, getProjectRoot} from '../../helpers/git/GitUtils.js'
import {buildOutputFileName, writeDiagram} from '../../helpers/output/OutputWriter.js'

import type {ToolDefinition} from '../registry.js'

const name = 'generate-class-diagram'
const description = 'Generate a mermaid class diagram of every class, interface and enum in a TypeScript project'

export async function executeClassDiagram(
    params: ClassInputSchema,
    config?: ServerConfig,
): Promise<string> {
    try {
        const serverConfig = config ?? getServerConfigFromEnv()
        const rootPath = params.projectPath || (await getProjectRoot())
        const projectName = getProjectName(rootPath)

        console.error(`Generating Mermaid UML for project: ${projectName}`)

        const units = analyzeProject(rootPath, [...params.excludePatterns, ...serverConfig.excludePatterns])
        const {entities, diagram} = generateClassDiagram(units, params, params.title)
        const relationshipCount = entities.reduce((count, entity) => count + entity.relationships.length, 0)

        console.error(`Found ${entities.length} types with ${relationshipCount} relationships`)

        const outputDir = params.outputDir || serverConfig.outputDir
        let savedTo: string | null = null
        if (outputDir) {
            savedTo = await writeDiagram(outputDir, buildOutputFileName(projectName, params), diagram)
            console.error(`UML diagram saved to: ${savedTo}`)
        }

        return `# ${projectName} Class Diagram

## Generated Diagram
${diagram}
## Analysis Details
- **Project Path**: ${rootPath}
- **Source Files**: ${units.length}
- **Types**: ${entities.length}
- **Relationships**: ${relationshipCount}
${savedTo ? `- **Saved To**: ${savedTo}\n` : ''}`
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        throw new Error(`Failed to generate class diagram: ${message}`)
    }
}

export const classDiagramTool: ToolDefinition = {
    name,
    description,
    parameters: classInputSchema,
    addTo: (server) =>
        server.addTool({name, description, parameters: classInputSchema, execute: (params) => executeClassDiagram(params)}),
}
