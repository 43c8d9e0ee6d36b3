import path from 'path'

import {Node, Scope, SyntaxKind, ts, type EnumDeclaration, type Expression, type Type} from 'ts-morph'

import {SYSTEM_NAMESPACE_PREFIX} from '../../diagram/relationship-inferencer.js'

import type {Accessibility, ReferenceKind, TypeReference} from '../../types.js'

export type AnalyzerContext = {
    /**
     * 네임스페이스 선언이 없는 파일은 이 경로 기준의 디렉터리를 네임스페이스로 쓴다
     */
    projectRoot: string
}

export function toAccessibility(scope: Scope | undefined, name = ''): Accessibility {
    // #private 필드
    if (name.startsWith('#')) {
        return 'private'
    }

    switch (scope) {
        case Scope.Private:
            return 'private'
        case Scope.Protected:
            return 'protected'
        default:
            return 'public'
    }
}

/**
 * `namespace A.B {}` 안이면 "A.B", 아니면 프로젝트 루트 기준 디렉터리 (루트면 null)
 */
export function getDeclarationNamespace(node: Node, context: AnalyzerContext): string | null {
    const names: string[] = []
    let current: ts.Node | undefined = node.compilerNode.parent
    while (current) {
        if (ts.isModuleDeclaration(current) && ts.isIdentifier(current.name)) {
            names.unshift(current.name.text)
        }
        current = current.parent
    }

    if (names.length > 0) {
        return names.join('.')
    }

    const directory = path.relative(context.projectRoot, node.getSourceFile().getDirectoryPath())
    if (!directory || directory.startsWith('..')) {
        return null
    }
    return directory.split(path.sep).join('/')
}

/**
 * `extends Base<T>`, `implements ns.IFoo` 같은 식에서 타입 이름만 뽑는다
 */
export function getExpressionTypeName(expression: Expression): string {
    if (Node.isIdentifier(expression)) {
        return expression.getText()
    }

    if (Node.isPropertyAccessExpression(expression)) {
        return expression.getName()
    }

    const symbol = expression.getSymbol()
    if (symbol) {
        return symbol.getName()
    }

    const firstIdentifier = expression.getFirstDescendantByKind(SyntaxKind.Identifier)
    return firstIdentifier?.getText() || expression.getText().split('<')[0].trim()
}

function systemReference(name: string, kind: ReferenceKind | null = null): TypeReference {
    return {
        name,
        namespace: SYSTEM_NAMESPACE_PREFIX,
        kind,
        elementType: null,
        typeArguments: [],
        interfaces: [],
    }
}

function getDeclarationKind(node: Node): ReferenceKind | null {
    if (Node.isEnumDeclaration(node)) return 'enum'
    if (Node.isClassDeclaration(node)) return 'class'
    if (Node.isInterfaceDeclaration(node)) return 'interface'
    return null
}

function isExternalDeclaration(node: Node): boolean {
    const sourceFile = node.getSourceFile()
    return sourceFile.isInNodeModules() || sourceFile.isFromExternalLibrary() || sourceFile.isDeclarationFile()
}

function describeEnumReference(enumDecl: EnumDeclaration, context: AnalyzerContext): TypeReference {
    return {
        name: enumDecl.getName(),
        namespace: isExternalDeclaration(enumDecl)
            ? SYSTEM_NAMESPACE_PREFIX
            : getDeclarationNamespace(enumDecl, context),
        kind: 'enum',
        elementType: null,
        typeArguments: [],
        interfaces: [],
    }
}

/**
 * 상속/구현하는 인터페이스와 부모 타입 이름을 모두 모은다 (컬렉션 판별용)
 */
export function collectInterfaceNames(type: Type, names = new Set<string>()): string[] {
    for (const base of type.getBaseTypes()) {
        const baseName = base.getSymbol()?.getName()
        if (baseName && !names.has(baseName)) {
            names.add(baseName)
            collectInterfaceNames(base, names)
        }
    }

    for (const declaration of type.getSymbol()?.getDeclarations() ?? []) {
        if (Node.isClassDeclaration(declaration)) {
            declaration.getImplements().forEach((impl) => names.add(getExpressionTypeName(impl.getExpression())))
        }
    }

    return [...names]
}

function withoutNullish(type: Type): Type {
    if (!type.isUnion() || !type.getUnionTypes().some((member) => member.isUndefined() || member.isNull())) {
        return type
    }

    const nonNullable = type.getNonNullableType()

    // `Status | undefined`에서 undefined를 빼면 enum 멤버들의 유니온이 되므로 enum 타입으로 되돌린다
    const members = nonNullable.isUnion() ? nonNullable.getUnionTypes() : []
    if (members.length > 0 && members.every((member) => member.isEnumLiteral())) {
        const enumType = members[0].getBaseTypeOfLiteralType()
        if (members.every((member) => member.getBaseTypeOfLiteralType().compilerType === enumType.compilerType)) {
            return enumType
        }
    }

    return nonNullable
}

/**
 * ts-morph 타입을 다이어그램용 타입 참조로 바꾼다.
 * 프로젝트 밖에서 선언된 타입, 기본 타입, 타입 파라미터, 익명 타입은 System 네임스페이스로 둔다
 */
export function describeType(rawType: Type, context: AnalyzerContext): TypeReference {
    const type = withoutNullish(rawType)

    if (type.isArray()) {
        const elementType = type.getArrayElementType()
        return {
            ...systemReference('Array'),
            elementType: elementType ? describeType(elementType, context) : null,
        }
    }

    if (type.isTypeParameter()) {
        return systemReference(type.getText(), 'typeParameter')
    }

    const symbol = type.getSymbol()
    const declaration = symbol?.getDeclarations()[0]

    // 멤버가 하나인 enum이나 `readonly x = Status.Active`는 enum 멤버 리터럴 타입이 된다
    if (declaration && Node.isEnumMember(declaration)) {
        return describeEnumReference(declaration.getParent(), context)
    }

    if (!symbol || !declaration || type.isAnonymous() || symbol.getName().startsWith('__')) {
        return systemReference(type.getText(), 'primitive')
    }

    const typeArguments = type.isObject()
        ? type.getTypeArguments().map((argument) => describeType(argument, context))
        : []
    const base = {
        name: symbol.getName(),
        kind: getDeclarationKind(declaration),
        elementType: null,
        typeArguments,
        interfaces: collectInterfaceNames(type),
    }

    if (isExternalDeclaration(declaration)) {
        return {...base, namespace: SYSTEM_NAMESPACE_PREFIX}
    }

    return {...base, namespace: getDeclarationNamespace(declaration, context)}
}
