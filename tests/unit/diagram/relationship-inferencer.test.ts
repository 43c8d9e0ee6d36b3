import {describe, expect, it} from 'vitest'

import {buildEntity} from '../../../src/diagram/entity-builder.js'
import {
    inferRelationships,
    RelationshipSetBuilder,
    resolveTargetType,
} from '../../../src/diagram/relationship-inferencer.js'
import {arrayOf, classType, interfaceType, listOf, projectRef, property, systemRef} from '../../helpers/fixtures.js'

import type {TypeDescription} from '../../../src/types.js'

function infer(description: TypeDescription, nestedInheritance = false) {
    return inferRelationships(buildEntity(description), description, {nestedInheritance}).relationships
}

describe('inferRelationships', () => {
    describe('inheritance', () => {
        const dog = classType('Dog', {baseType: 'Animal', ancestors: ['Animal', 'LivingThing', 'Object']})

        it('links only the direct base type by default', () => {
            expect(infer(dog)).toEqual([{from: 'Dog', to: 'Animal', kind: 'Inheritance', linkStyle: 'Solid'}])
        })

        it('links every ancestor except the root type in nested mode', () => {
            expect(infer(dog, true)).toEqual([
                {from: 'Dog', to: 'Animal', kind: 'Inheritance', linkStyle: 'Solid'},
                {from: 'Dog', to: 'LivingThing', kind: 'Inheritance', linkStyle: 'Solid'},
            ])
        })

        it('never targets the root object type', () => {
            expect(infer(classType('Thing', {baseType: 'Object', ancestors: ['Object']}))).toEqual([])
        })
    })

    describe('interfaces', () => {
        it('realizes interfaces from classes', () => {
            expect(infer(classType('Dog', {interfaces: ['IPet', 'IComparable']}))).toEqual([
                {from: 'Dog', to: 'IPet', kind: 'Realization', linkStyle: 'Dashed'},
                {from: 'Dog', to: 'IComparable', kind: 'Realization', linkStyle: 'Dashed'},
            ])
        })

        it('inherits interfaces from interfaces', () => {
            expect(infer(interfaceType('IPet', {interfaces: ['IAnimal']}))).toEqual([
                {from: 'IPet', to: 'IAnimal', kind: 'Inheritance', linkStyle: 'Dashed'},
            ])
        })
    })

    describe('member types', () => {
        it('aggregates collection elements back into the owner', () => {
            const relationships = infer(classType('Dog', {properties: [property('Toys', listOf(projectRef('Toy')))]}))

            expect(relationships).toEqual([{from: 'Toy', to: 'Dog', kind: 'Aggregation', linkStyle: 'Solid'}])
        })

        it('aggregates array elements', () => {
            const relationships = infer(classType('Kennel', {properties: [property('Dogs', arrayOf(projectRef('Dog')))]}))

            expect(relationships).toEqual([{from: 'Dog', to: 'Kennel', kind: 'Aggregation', linkStyle: 'Solid'}])
        })

        it('depends on enums regardless of collection shape', () => {
            const status = projectRef('Status', {kind: 'enum'})

            expect(infer(classType('Owner', {properties: [property('State', status)]}))).toEqual([
                {from: 'Owner', to: 'Status', kind: 'Dependency', linkStyle: 'Solid'},
            ])
            expect(infer(classType('Owner', {properties: [property('History', listOf(status))]}))).toEqual([
                {from: 'Owner', to: 'Status', kind: 'Dependency', linkStyle: 'Solid'},
            ])
        })

        it('associates plain references and single-argument wrappers', () => {
            const lazyEngine = projectRef('Lazy', {typeArguments: [projectRef('Engine')]})

            expect(
                infer(classType('Car', {properties: [property('Owner', projectRef('Person')), property('Engine', lazyEngine)]})),
            ).toEqual([
                {from: 'Car', to: 'Person', kind: 'Association', linkStyle: 'Solid'},
                {from: 'Car', to: 'Engine', kind: 'Association', linkStyle: 'Solid'},
            ])
        })

        it('skips system types', () => {
            const relationships = infer(
                classType('Visit', {
                    properties: [
                        property('When', systemRef('DateTime', {kind: 'class'})),
                        property('Notes', listOf(systemRef('string'))),
                        property('Lookup', systemRef('Dictionary', {typeArguments: [systemRef('string'), projectRef('Dog')]})),
                    ],
                }),
            )

            expect(relationships).toEqual([])
        })

        it('associates types it cannot classify', () => {
            const unknown = projectRef('Mystery', {namespace: null, kind: null})

            expect(infer(classType('Box', {properties: [property('Content', unknown)]}))).toEqual([
                {from: 'Box', to: 'Mystery', kind: 'Association', linkStyle: 'Solid'},
            ])
        })
    })

    it('never repeats the same edge', () => {
        const relationships = infer(
            classType('Dog', {
                interfaces: ['IPet', 'IPet'],
                properties: [
                    property('Friend', projectRef('Cat')),
                    property('Rival', projectRef('Cat')),
                    property('Toys', listOf(projectRef('Toy'))),
                    property('SpareToys', arrayOf(projectRef('Toy'))),
                ],
            }),
        )

        expect(relationships.map((r) => `${r.from} ${r.kind} ${r.to}`)).toEqual([
            'Dog Realization IPet',
            'Dog Association Cat',
            'Toy Aggregation Dog',
        ])
    })

    it('returns a frozen relationship list', () => {
        const relationships = infer(classType('Dog', {baseType: 'Animal'}))

        expect(Object.isFrozen(relationships)).toBe(true)
        expect(Object.isFrozen(relationships[0])).toBe(true)
    })
})

describe('resolveTargetType', () => {
    it('unwraps either an array or a single-argument generic, not both', () => {
        const toy = projectRef('Toy')
        const toys = listOf(toy)

        expect(resolveTargetType(arrayOf(toy))).toBe(toy)
        expect(resolveTargetType(toys)).toBe(toy)
        expect(resolveTargetType(arrayOf(toys))).toBe(toys)
        expect(resolveTargetType(toy)).toBe(toy)
    })
})

describe('RelationshipSetBuilder', () => {
    it('keeps edges that differ only by kind', () => {
        const relationships = new RelationshipSetBuilder()
            .add('Dog', 'Animal', 'Inheritance', 'Solid')
            .add('Dog', 'Animal', 'Association', 'Solid')
            .add('Dog', 'Animal', 'Inheritance', 'Dashed')
            .build()

        expect(relationships).toEqual([
            {from: 'Dog', to: 'Animal', kind: 'Inheritance', linkStyle: 'Solid'},
            {from: 'Dog', to: 'Animal', kind: 'Association', linkStyle: 'Solid'},
        ])
    })
})
