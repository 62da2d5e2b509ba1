import type {
  BootstrapConfig,
  ExecAdapter,
  InterpreterSource,
  LocatedInterpreter,
  Logger,
  OperatingSystem,
  ToolCacheAdapter,
  WhichAdapter,
} from './types.js'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import {toErrorMessage} from '../../utils/errors.js'
import {getMinorVersion} from '../../utils/validation.js'
import {PYTHON_TOOL_CACHE_NAME} from '../constants.js'
import {detectOperatingSystem} from './install.js'

export interface LocateDeps {
  readonly logger: Logger
  readonly execAdapter: ExecAdapter
  readonly whichAdapter: WhichAdapter
  readonly toolCache?: ToolCacheAdapter
  readonly operatingSystem?: OperatingSystem | null
}

/**
 * Command names tried in order: `python3.10`, `python310`, `python3`, `python`.
 */
export function getCandidateCommands(version: string): string[] {
  const minor = getMinorVersion(version)
  const [major] = minor.split('.')
  const candidates = [`python${minor}`, `python${minor.replaceAll('.', '')}`, `python${major ?? ''}`, 'python']
  return [...new Set(candidates)]
}

/**
 * Extract the version reported by `python --version`, e.g. "3.10.12" from "Python 3.10.12".
 */
export function parseInterpreterVersion(output: string): string | null {
  const match = /^\s*Python\s+(\d+(?:\.\d+)*)/im.exec(output)
  return match?.[1] ?? null
}

/**
 * Compare a reported version against the target component by component.
 * "3.10" matches "3.10.12" but neither "3.100.1" nor "3.1.0".
 */
export function versionMatches(actual: string, target: string): boolean {
  const actualParts = actual.split('.')
  const targetParts = target.split('.')
  if (targetParts.length > actualParts.length) {
    return false
  }
  return targetParts.every((part, index) => Number(part) === Number(actualParts[index]))
}

/**
 * Run `<candidate> --version` and return the reported version when it matches the target.
 * Failures are reported as null.
 */
export async function verifyInterpreter(
  candidatePath: string,
  targetVersion: string,
  logger: Logger,
  execAdapter: ExecAdapter,
): Promise<string | null> {
  try {
    const {exitCode, stdout, stderr} = await execAdapter.getExecOutput(candidatePath, ['--version'], {
      silent: true,
      ignoreReturnCode: true,
    })
    if (exitCode !== 0) {
      logger.debug('Version query failed', {candidate: candidatePath, exitCode})
      return null
    }

    // Python 2 prints the version on stderr
    const version = parseInterpreterVersion(`${stdout}\n${stderr}`)
    if (version == null || !versionMatches(version, targetVersion)) {
      logger.debug('Version mismatch', {candidate: candidatePath, version, targetVersion})
      return null
    }
    return version
  } catch (error) {
    logger.debug('Could not run version query', {candidate: candidatePath, error: toErrorMessage(error)})
    return null
  }
}

function getToolCacheInterpreter(toolDir: string, operatingSystem: OperatingSystem | null): string {
  return operatingSystem === 'windows' ? path.join(toolDir, 'python.exe') : path.join(toolDir, 'bin', 'python')
}

async function findInToolCache(
  version: string,
  toolCache: ToolCacheAdapter,
  operatingSystem: OperatingSystem | null,
  logger: Logger,
): Promise<string | null> {
  let toolDir: string
  try {
    toolDir = toolCache.find(PYTHON_TOOL_CACHE_NAME, version)
  } catch (error) {
    logger.debug('Tool cache lookup failed', {error: toErrorMessage(error)})
    return null
  }
  if (toolDir.length === 0) {
    return null
  }

  const interpreter = getToolCacheInterpreter(toolDir, operatingSystem)
  try {
    await fs.access(interpreter)
    return interpreter
  } catch {
    logger.debug('Tool cache entry has no interpreter', {toolDir})
    return null
  }
}

/**
 * Locate an interpreter matching the configured version.
 *
 * Checks the runner tool cache first, then each candidate command on PATH.
 * Returns the first verified interpreter, or null.
 */
export async function locateInterpreter(config: BootstrapConfig, deps: LocateDeps): Promise<LocatedInterpreter | null> {
  const {logger, execAdapter, whichAdapter, toolCache, operatingSystem = detectOperatingSystem()} = deps
  const targetVersion = config.pythonVersion

  const verified = async (candidatePath: string, source: InterpreterSource): Promise<LocatedInterpreter | null> => {
    const version = await verifyInterpreter(candidatePath, targetVersion, logger, execAdapter)
    if (version == null) {
      return null
    }
    logger.info('Interpreter found', {path: candidatePath, version, source})
    return {path: candidatePath, version, source}
  }

  if (toolCache != null) {
    const cached = await findInToolCache(targetVersion, toolCache, operatingSystem, logger)
    const result = cached == null ? null : await verified(cached, 'tool-cache')
    if (result != null) {
      return result
    }
  }

  for (const candidate of getCandidateCommands(targetVersion)) {
    let resolved: string
    try {
      resolved = await whichAdapter.which(candidate)
    } catch (error) {
      logger.debug('Could not resolve candidate', {candidate, error: toErrorMessage(error)})
      continue
    }
    if (resolved.length === 0) {
      logger.debug('Candidate not on PATH', {candidate})
      continue
    }

    const result = await verified(resolved, 'path')
    if (result != null) {
      return result
    }
  }

  logger.info('No matching interpreter found', {targetVersion})
  return null
}
