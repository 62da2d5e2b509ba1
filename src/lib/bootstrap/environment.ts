import type {BootstrapConfig, EnvironmentResult, ExecAdapter, Logger, OperatingSystem} from './types.js'
import * as path from 'node:path'

import {pathExists} from '../../utils/paths.js'
import {runRequired} from './exec.js'

export interface EnvironmentDeps {
  readonly logger: Logger
  readonly execAdapter: ExecAdapter
}

/**
 * Interpreter inside an environment directory: `Scripts/python.exe` on Windows, `bin/python` elsewhere.
 */
export function getEnvironmentInterpreter(environmentDir: string, operatingSystem: OperatingSystem | null): string {
  return operatingSystem === 'windows'
    ? path.join(environmentDir, 'Scripts', 'python.exe')
    : path.join(environmentDir, 'bin', 'python')
}

/**
 * Create the environment directory with `<interpreter> -m venv` unless it already exists.
 *
 * @throws BootstrapError if environment creation fails
 */
export async function buildEnvironment(
  config: BootstrapConfig,
  interpreterPath: string,
  operatingSystem: OperatingSystem | null,
  deps: EnvironmentDeps,
): Promise<EnvironmentResult> {
  const {logger} = deps
  const environmentDir = config.environmentDir
  const pythonPath = getEnvironmentInterpreter(environmentDir, operatingSystem)

  if (await pathExists(environmentDir)) {
    logger.info('Environment already exists', {path: environmentDir})
    return {path: environmentDir, pythonPath, created: false}
  }

  logger.info('Creating environment', {path: environmentDir, interpreter: interpreterPath})
  await runRequired('build-environment', interpreterPath, ['-m', 'venv', environmentDir], deps, {
    cwd: config.rootDir,
    hint: `could not create environment at ${environmentDir}`,
  })

  logger.info('Environment created', {path: environmentDir})
  return {path: environmentDir, pythonPath, created: true}
}
