import fs from 'fs'
import path from 'path'

import {afterAll, describe, expect, it} from 'vitest'

import {DEFAULT_DIAGRAM_OPTIONS} from '../../../src/diagram/options.js'
import {buildOutputFileName, writeDiagram} from '../../../src/helpers/output/OutputWriter.js'
import {createTmpProject, removeTmpProject} from '../../helpers/tmp-project.js'

describe('buildOutputFileName', () => {
    it('uses the project name when no option is set', () => {
        expect(buildOutputFileName('Zoo', DEFAULT_DIAGRAM_OPTIONS)).toBe('Zoo.md')
    })

    it('appends a suffix for every enabled option in a fixed order', () => {
        expect(
            buildOutputFileName('Zoo', {
                excludeClasses: true,
                excludeInterfaces: true,
                excludeEnums: true,
                nestedInheritance: true,
                groupByNamespace: true,
            }),
        ).toBe('Zoo_NoClasses_NoInterfaces_NoEnums_NestedInheritance_WithNamespaces.md')
        expect(buildOutputFileName('Zoo', {...DEFAULT_DIAGRAM_OPTIONS, groupByNamespace: true, excludeEnums: true})).toBe(
            'Zoo_NoEnums_WithNamespaces.md',
        )
    })
})

describe('writeDiagram', () => {
    const root = createTmpProject({})

    afterAll(() => {
        removeTmpProject(root)
    })

    it('creates the output directory and writes the file', async () => {
        const outputDir = path.join(root, 'docs', 'uml')

        const outputPath = await writeDiagram(outputDir, 'Zoo.md', 'classDiagram\n')

        expect(outputPath).toBe(path.join(outputDir, 'Zoo.md'))
        expect(fs.readFileSync(outputPath, 'utf-8')).toBe('classDiagram\n')
    })
})
