import {z} from 'zod'

import {diagramOptionsSchema} from '../../diagram/options.js'

import type {ReferenceKind, TypeReference} from '../../types.js'

const accessibilitySchema = z
    .enum(['public', 'private', 'protected', 'internal', 'protectedOrInternal', 'notApplicable'])
    .default('public')

const referenceKindSchema = z.enum(['class', 'interface', 'enum', 'primitive', 'typeParameter'])

export type TypeReferenceInput = {
    name: string
    namespace?: string | null
    kind?: ReferenceKind | null
    elementType?: TypeReferenceInput | null
    typeArguments?: TypeReferenceInput[]
    interfaces?: string[]
}

export const typeReferenceSchema: z.ZodType<TypeReference, z.ZodTypeDef, TypeReferenceInput> = z.lazy(() =>
    z.object({
        name: z.string().min(1).describe('Simple type name without namespace or type arguments'),
        namespace: z.string().nullable().default(null),
        kind: referenceKindSchema.nullable().default(null),
        elementType: typeReferenceSchema.nullable().default(null),
        typeArguments: z.array(typeReferenceSchema).default([]),
        interfaces: z.array(z.string()).default([]),
    }),
)

export const propertyDescriptionSchema = z.object({
    name: z.string().min(1),
    type: typeReferenceSchema,
    accessibility: accessibilitySchema,
})

export const methodDescriptionSchema = z.object({
    name: z.string().min(1),
    returnType: typeReferenceSchema,
    accessibility: accessibilitySchema,
    parameters: z.array(z.object({name: z.string(), type: typeReferenceSchema})).default([]),
    isAsync: z.boolean().default(false),
})

export const typeDescriptionSchema = z.object({
    name: z.string().min(1),
    kind: z.enum(['class', 'interface']),
    isAbstract: z.boolean().default(false),
    accessibility: accessibilitySchema,
    namespace: z.string().nullable().default(null),
    baseType: z.string().nullable().default(null),
    ancestors: z.array(z.string()).default([]),
    interfaces: z.array(z.string()).default([]),
    properties: z.array(propertyDescriptionSchema).default([]),
    methods: z.array(methodDescriptionSchema).default([]),
})

export const enumDescriptionSchema = z.object({
    name: z.string().min(1),
    members: z.array(z.string()).default([]),
    namespace: z.string().nullable().default(null),
})

export const renderInputSchema = diagramOptionsSchema.extend({
    types: z.array(typeDescriptionSchema).describe('Declared classes and interfaces, in declaration order').default([]),
    enums: z.array(enumDescriptionSchema).describe('Declared enums, in declaration order').default([]),
    title: z.string().describe('Diagram title (defaults to the first type name)').optional(),
})
export type RenderInputSchema = z.infer<typeof renderInputSchema>
