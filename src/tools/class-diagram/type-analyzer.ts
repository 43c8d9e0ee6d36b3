/* eslint-disable no-console */
import {
    Node,
    type ClassDeclaration,
    type EnumDeclaration,
    type InterfaceDeclaration,
    type ParameterDeclaration,
    type SourceFile,
    type Type,
} from 'ts-morph'

import {
    describeType,
    getDeclarationNamespace,
    getExpressionTypeName,
    toAccessibility,
    type AnalyzerContext,
} from './type-utils.js'
import {createProject, loadSourceFiles} from '../../helpers/project/ProjectManager.js'

import type {EnumDescription, MethodDescription, PropertyDescription, SourceUnit, TypeDescription} from '../../types.js'

function describeParameters(parameters: ParameterDeclaration[], context: AnalyzerContext) {
    return parameters.map((param) => ({
        name: param.getName(),
        type: describeType(param.getType(), context),
    }))
}

function describeFunctionMember(
    name: string,
    returnType: Type,
    parameters: ParameterDeclaration[],
    accessibility: MethodDescription['accessibility'],
    isAsync: boolean,
    context: AnalyzerContext,
): MethodDescription {
    return {
        name,
        returnType: describeType(returnType, context),
        accessibility,
        parameters: describeParameters(parameters, context),
        isAsync,
    }
}

/**
 * get 접근자는 반환 타입으로, getter 없는 set 접근자는 매개변수 타입으로 속성이 된다
 */
function describeAccessors(
    node: ClassDeclaration | InterfaceDeclaration,
    context: AnalyzerContext,
): PropertyDescription[] {
    const getters = node.getGetAccessors()
    const getterNames = new Set(getters.map((getter) => getter.getName()))

    const fromGetters = getters.map((getter) => ({
        name: getter.getName(),
        type: describeType(getter.getReturnType(), context),
        accessibility: toAccessibility(getter.getScope(), getter.getName()),
    }))

    const fromSetters = node
        .getSetAccessors()
        .filter((setter) => !getterNames.has(setter.getName()))
        .flatMap((setter) => {
            const [value] = setter.getParameters()
            if (!value) {
                return []
            }
            return [
                {
                    name: setter.getName(),
                    type: describeType(value.getType(), context),
                    accessibility: toAccessibility(setter.getScope(), setter.getName()),
                },
            ]
        })

    return [...fromGetters, ...fromSetters]
}

/**
 * 부모 클래스 이름. 선언을 찾을 수 없으면 extends 식의 이름을 쓴다
 */
function getBaseClassName(classDecl: ClassDeclaration): string | null {
    const extendsExpr = classDecl.getExtends()
    if (!extendsExpr) {
        return null
    }
    return classDecl.getBaseClass()?.getName() ?? getExpressionTypeName(extendsExpr.getExpression())
}

/**
 * 가까운 부모부터 모든 조상 클래스
 */
function getAncestorNames(classDecl: ClassDeclaration): string[] {
    const directBase = getBaseClassName(classDecl)
    if (!directBase) {
        return []
    }

    const ancestors = [directBase]
    const visited = new Set<ClassDeclaration>([classDecl])
    let current = classDecl.getBaseClass()

    while (current && !visited.has(current)) {
        visited.add(current)
        const parentName = getBaseClassName(current)
        if (!parentName) {
            break
        }
        ancestors.push(parentName)
        current = current.getBaseClass()
    }

    return ancestors
}

export function analyzeClass(classDecl: ClassDeclaration, context: AnalyzerContext): TypeDescription | null {
    const name = classDecl.getName()
    if (!name) {
        return null
    }

    const properties: PropertyDescription[] = []
    const methods: MethodDescription[] = []

    classDecl.getProperties().forEach((property) => {
        const propertyName = property.getName()
        const accessibility = toAccessibility(property.getScope(), propertyName)

        // 화살표 함수 속성은 메서드로 처리
        const initializer = property.getInitializer()
        if (initializer && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
            methods.push(
                describeFunctionMember(
                    propertyName,
                    initializer.getReturnType(),
                    initializer.getParameters(),
                    accessibility,
                    initializer.isAsync(),
                    context,
                ),
            )
            return
        }

        properties.push({
            name: propertyName,
            type: describeType(property.getType(), context),
            accessibility,
        })
    })

    // 생성자 매개변수 속성 (constructor(private repo: Repo))
    classDecl.getConstructors().forEach((constructor) => {
        constructor
            .getParameters()
            .filter((param) => param.isParameterProperty())
            .forEach((param) => {
                properties.push({
                    name: param.getName(),
                    type: describeType(param.getType(), context),
                    accessibility: toAccessibility(param.getScope()),
                })
            })
    })

    properties.push(...describeAccessors(classDecl, context))

    classDecl.getMethods().forEach((method) => {
        const methodName = method.getName()
        methods.push(
            describeFunctionMember(
                methodName,
                method.getReturnType(),
                method.getParameters(),
                toAccessibility(method.getScope(), methodName),
                method.isAsync(),
                context,
            ),
        )
    })

    return {
        name,
        kind: 'class',
        isAbstract: classDecl.isAbstract(),
        accessibility: classDecl.isExported() ? 'public' : 'internal',
        namespace: getDeclarationNamespace(classDecl, context),
        baseType: getBaseClassName(classDecl),
        ancestors: getAncestorNames(classDecl),
        interfaces: classDecl.getImplements().map((impl) => getExpressionTypeName(impl.getExpression())),
        properties,
        methods,
    }
}

export function analyzeInterface(interfaceDecl: InterfaceDeclaration, context: AnalyzerContext): TypeDescription {
    return {
        name: interfaceDecl.getName(),
        kind: 'interface',
        isAbstract: false,
        accessibility: interfaceDecl.isExported() ? 'public' : 'internal',
        namespace: getDeclarationNamespace(interfaceDecl, context),
        baseType: null,
        ancestors: [],
        interfaces: interfaceDecl.getExtends().map((ext) => getExpressionTypeName(ext.getExpression())),
        properties: [
            ...interfaceDecl.getProperties().map(
                (property): PropertyDescription => ({
                    name: property.getName(),
                    type: describeType(property.getType(), context),
                    accessibility: 'public',
                }),
            ),
            ...describeAccessors(interfaceDecl, context),
        ],
        methods: interfaceDecl
            .getMethods()
            .map((method) =>
                describeFunctionMember(
                    method.getName(),
                    method.getReturnType(),
                    method.getParameters(),
                    'public',
                    false,
                    context,
                ),
            ),
    }
}

export function analyzeEnum(enumDecl: EnumDeclaration, context: AnalyzerContext): EnumDescription {
    return {
        name: enumDecl.getName(),
        members: enumDecl.getMembers().map((member) => member.getName()),
        namespace: getDeclarationNamespace(enumDecl, context),
    }
}

/**
 * 파일 안의 클래스/인터페이스를 선언 순서대로, 그다음 enum들
 */
export function analyzeSourceFile(sourceFile: SourceFile, context: AnalyzerContext): SourceUnit {
    const unit: SourceUnit = {types: [], enums: []}

    for (const node of sourceFile.getDescendants()) {
        if (Node.isClassDeclaration(node)) {
            const description = analyzeClass(node, context)
            if (description) {
                unit.types.push(description)
            } else {
                console.error(`Skipping anonymous class in ${sourceFile.getFilePath()}`)
            }
        } else if (Node.isInterfaceDeclaration(node)) {
            unit.types.push(analyzeInterface(node, context))
        } else if (Node.isEnumDeclaration(node)) {
            unit.enums.push(analyzeEnum(node, context))
        }
    }

    return unit
}

export function analyzeProject(projectPath: string, excludePatterns: string[]): SourceUnit[] {
    const project = createProject(projectPath)
    const sourceFiles = loadSourceFiles(project, projectPath, excludePatterns)
    console.error(`Analyzing ${sourceFiles.length} files in ${projectPath}...`)

    const context: AnalyzerContext = {projectRoot: projectPath}
    return sourceFiles.map((sourceFile) => {
        try {
            return analyzeSourceFile(sourceFile, context)
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error)
            throw new Error(`Failed to analyze ${sourceFile.getFilePath()}: ${message}`)
        }
    })
}
