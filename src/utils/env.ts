import * as os from 'node:os'
import process from 'node:process'

export type RunnerOS = 'Linux' | 'macOS' | 'Windows'

function isRunnerOS(value: string): value is RunnerOS {
  return value === 'Linux' || value === 'macOS' || value === 'Windows'
}

/**
 * Operating system family of the current host.
 *
 * An explicit `platform` is mapped as given. Without one, RUNNER_OS wins when it names a
 * known family (CI runners export it). Returns null for platforms without an interpreter
 * installer.
 */
export function getRunnerOS(platform?: NodeJS.Platform): RunnerOS | null {
  if (platform == null) {
    const runnerOs = process.env.RUNNER_OS?.trim()
    if (runnerOs != null && isRunnerOS(runnerOs)) {
      return runnerOs
    }
  }
  switch (platform ?? os.platform()) {
    case 'darwin':
      return 'macOS'
    case 'win32':
      return 'Windows'
    case 'linux':
      return 'Linux'
    default:
      return null
  }
}

export function getRunnerToolCache(): string | null {
  const toolCache = process.env.RUNNER_TOOL_CACHE
  if (toolCache != null && toolCache.trim().length > 0) {
    return toolCache
  }
  return null
}
