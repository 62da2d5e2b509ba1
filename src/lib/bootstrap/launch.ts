import type {BootstrapConfig, Logger, ProcessLauncher} from './types.js'

import {toErrorMessage} from '../../utils/errors.js'
import {formatCommandLine} from '../../utils/format.js'
import {pathExists} from '../../utils/paths.js'
import {BootstrapError} from './errors.js'

export interface LaunchDeps {
  readonly logger: Logger
  readonly launcher: ProcessLauncher
}

/**
 * Run the entry point with the environment's interpreter. Standard streams are inherited.
 *
 * @returns The application's exit code (always 0)
 * @throws BootstrapError if the entry point is missing, cannot be started or exits non-zero
 */
export async function launchApplication(config: BootstrapConfig, pythonPath: string, deps: LaunchDeps): Promise<number> {
  const {logger, launcher} = deps
  const entryPoint = config.entryPoint

  if (!(await pathExists(entryPoint))) {
    throw new BootstrapError('launch', `Entry point not found: ${entryPoint}`)
  }

  const commandLine = formatCommandLine(pythonPath, [entryPoint])
  logger.info('Launching application', {command: commandLine})

  let exitCode: number
  try {
    exitCode = await launcher(pythonPath, [entryPoint], {cwd: config.rootDir})
  } catch (error) {
    throw new BootstrapError('launch', `${commandLine} failed: ${toErrorMessage(error)}`, {cause: error})
  }

  if (exitCode !== 0) {
    throw new BootstrapError('launch', `Application exited with code ${exitCode}`)
  }

  logger.info('Application exited', {exitCode})
  return exitCode
}
