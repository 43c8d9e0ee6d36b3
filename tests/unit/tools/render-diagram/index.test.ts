import {describe, expect, it} from 'vitest'

import {executeRenderDiagram} from '../../../../src/tools/render-diagram/index.js'
import {renderInputSchema, typeReferenceSchema} from '../../../../src/tools/render-diagram/schema.js'

describe('renderInputSchema', () => {
    it('fills defaults for optional contract fields', () => {
        const input = renderInputSchema.parse({
            types: [{name: 'Dog', kind: 'class', properties: [{name: 'Owner', type: {name: 'Person'}}]}],
        })

        expect(input.excludeEnums).toBe(false)
        expect(input.enums).toEqual([])
        expect(input.types[0]).toEqual({
            name: 'Dog',
            kind: 'class',
            isAbstract: false,
            accessibility: 'public',
            namespace: null,
            baseType: null,
            ancestors: [],
            interfaces: [],
            properties: [
                {
                    name: 'Owner',
                    accessibility: 'public',
                    type: {
                        name: 'Person',
                        namespace: null,
                        kind: null,
                        elementType: null,
                        typeArguments: [],
                        interfaces: [],
                    },
                },
            ],
            methods: [],
        })
    })

    it('parses nested type references', () => {
        const reference = typeReferenceSchema.parse({
            name: 'List',
            namespace: 'System.Collections.Generic',
            typeArguments: [{name: 'Toy', namespace: 'Zoo', kind: 'class'}],
        })

        expect(reference.typeArguments[0]).toEqual({
            name: 'Toy',
            namespace: 'Zoo',
            kind: 'class',
            elementType: null,
            typeArguments: [],
            interfaces: [],
        })
    })

    it('rejects unknown type kinds', () => {
        expect(renderInputSchema.safeParse({types: [{name: 'Dog', kind: 'struct'}]}).success).toBe(false)
    })
})

describe('executeRenderDiagram', () => {
    it('renders a diagram from a JSON description', async () => {
        const params = renderInputSchema.parse({
            title: 'Shelter',
            types: [
                {
                    name: 'Shelter',
                    kind: 'class',
                    namespace: 'Zoo',
                    properties: [
                        {
                            name: 'Dogs',
                            type: {
                                name: 'List',
                                namespace: 'System.Collections.Generic',
                                typeArguments: [{name: 'Dog', namespace: 'Zoo', kind: 'class'}],
                            },
                        },
                        {name: 'Opened', type: {name: 'DateTime', namespace: 'System'}},
                    ],
                },
            ],
            enums: [{name: 'Size', members: ['Small', 'Large']}],
        })

        const diagram = await executeRenderDiagram(params)

        expect(diagram.split('\n').slice(2, 3)).toEqual(['title: Shelter'])
        expect(diagram.split('\n').slice(8)).toEqual([
            '    class Shelter {',
            '        + List<Dog> Dogs',
            '        + DateTime Opened',
            '    }',
            '    <<Class>> Shelter',
            '    Dog --o Shelter : aggregates',
            '    class Size {',
            '        + enum Small',
            '        + enum Large',
            '    }',
            '    <<Enum>> Size',
            '```',
            '',
        ])
    })
})
