import {exec} from 'child_process'
import path from 'path'
import {promisify} from 'util'

const execAsync = promisify(exec)

export const isGitInstalled = async () => {
    try {
        await execAsync('git --version')
        return true
    } catch {
        return false
    }
}

export const getProjectRoot = async (cwd: string = process.cwd()) => {
    if (!(await isGitInstalled())) {
        throw new Error('Git is not installed or not available in PATH. Please specify projectPath manually.')
    }
    const {stdout} = await execAsync('git rev-parse --show-toplevel', {cwd})
    return stdout.trim()
}

/**
 * 출력 파일 이름에 쓰는 프로젝트 이름 (루트 디렉터리 이름)
 */
export const getProjectName = (projectRoot: string) => path.basename(path.resolve(projectRoot)) || 'project'
