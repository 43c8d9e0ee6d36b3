import fs from 'fs'
import path from 'path'

import {minimatch} from 'minimatch'
import {Project, ts, type SourceFile} from 'ts-morph'

export const DEFAULT_EXCLUDE_PATTERNS = [
    '**/node_modules/**',
    '**/.git/**',
    '**/dist/**',
    '**/build/**',
    '**/.*/**',
    '**/*.d.ts',
]

export function createProject(projectPath: string): Project {
    const tsConfigPath = path.join(projectPath, 'tsconfig.json')

    if (fs.existsSync(tsConfigPath)) {
        return new Project({
            tsConfigFilePath: tsConfigPath,
            skipAddingFilesFromTsConfig: true,
        })
    }

    // eslint-disable-next-line no-console
    console.error('tsconfig.json not found, using default configuration with allowJs: true')
    return new Project({
        compilerOptions: {
            target: ts.ScriptTarget.ES2020,
            module: ts.ModuleKind.CommonJS,
            allowJs: true,
            checkJs: false,
            declaration: false,
            strict: true,
        },
    })
}

export function isExcluded(relativePath: string, excludePatterns: string[]): boolean {
    return excludePatterns.some(
        (pattern) =>
            minimatch(relativePath, pattern, {dot: true}) ||
            minimatch(path.posix.basename(relativePath), pattern, {dot: true}),
    )
}

/**
 * 프로젝트의 TypeScript 파일을 경로 순서대로 돌려준다 (제외 패턴에 걸리는 파일은 빠진다)
 */
export function loadSourceFiles(project: Project, projectPath: string, excludePatterns: string[] = []): SourceFile[] {
    project.addSourceFilesAtPaths([
        path.join(projectPath, '**/*.{ts,tsx}'),
        `!${path.join(projectPath, '**/node_modules/**')}`,
    ])

    const allExcludes = [...DEFAULT_EXCLUDE_PATTERNS, ...excludePatterns]

    return project
        .getSourceFiles()
        .filter((sourceFile) => {
            const relativePath = path.relative(projectPath, sourceFile.getFilePath()).split(path.sep).join('/')
            return !relativePath.startsWith('..') && !isExcluded(relativePath, allExcludes)
        })
        .sort((a, b) => (a.getFilePath() < b.getFilePath() ? -1 : a.getFilePath() > b.getFilePath() ? 1 : 0))
}
