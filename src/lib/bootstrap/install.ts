import type {
  BootstrapConfig,
  ExecAdapter,
  InstallerDescriptor,
  InterpreterInstallResult,
  Logger,
  OperatingSystem,
} from './types.js'
import os from 'node:os'

import {getRunnerOS} from '../../utils/env.js'
import {toErrorMessage} from '../../utils/errors.js'
import {formatCommandLine, tailOutput} from '../../utils/format.js'
import {getMinorVersion} from '../../utils/validation.js'
import {OUTPUT_TAIL_LENGTH} from '../constants.js'
import {captureOutput} from './exec.js'

/**
 * One package manager invocation per operating system family, keyed by `MAJOR.MINOR`.
 */
export const INSTALLERS: Readonly<Record<OperatingSystem, (version: string) => InstallerDescriptor>> = {
  linux: version => ({
    manager: 'apt-get',
    command: 'sudo',
    args: ['apt-get', 'install', '-y', `python${version}`, `python${version}-venv`],
  }),
  macos: version => ({
    manager: 'brew',
    command: 'brew',
    args: ['install', `python@${version}`],
  }),
  windows: version => ({
    manager: 'winget',
    command: 'winget',
    args: ['install', '--exact', '--silent', '--id', `Python.Python.${version}`],
  }),
}

/**
 * Map the host platform to a supported operating system family, or null.
 */
export function detectOperatingSystem(platform?: NodeJS.Platform): OperatingSystem | null {
  switch (getRunnerOS(platform)) {
    case 'Linux':
      return 'linux'
    case 'macOS':
      return 'macos'
    case 'Windows':
      return 'windows'
    case null:
      return null
  }
}

export function getInstallerDescriptor(operatingSystem: OperatingSystem, version: string): InstallerDescriptor {
  return INSTALLERS[operatingSystem](getMinorVersion(version))
}

export interface InstallDeps {
  readonly logger: Logger
  readonly execAdapter: ExecAdapter
  readonly platform?: NodeJS.Platform
}

/**
 * Install the configured interpreter with the package manager of `operatingSystem`.
 *
 * Best-effort: failures are logged and reported in the result, never thrown.
 */
export async function installInterpreter(
  config: BootstrapConfig,
  operatingSystem: OperatingSystem | null,
  deps: InstallDeps,
): Promise<InterpreterInstallResult> {
  const {logger, execAdapter, platform = os.platform()} = deps

  if (operatingSystem == null) {
    const error = `No interpreter installer for platform ${platform}`
    logger.warning(error)
    return {installed: false, manager: null, error}
  }

  const descriptor = getInstallerDescriptor(operatingSystem, config.pythonVersion)
  const commandLine = formatCommandLine(descriptor.command, descriptor.args)
  logger.info('Installing interpreter', {
    version: config.pythonVersion,
    manager: descriptor.manager,
    command: commandLine,
  })

  const output = captureOutput()
  try {
    const exitCode = await execAdapter.exec(descriptor.command, [...descriptor.args], {
      listeners: output.listeners,
      ignoreReturnCode: true,
    })

    if (exitCode !== 0) {
      const error = `${commandLine} returned exit code ${exitCode}`
      logger.warning(error, {output: tailOutput(output.text(), OUTPUT_TAIL_LENGTH)})
      return {
        installed: false,
        manager: descriptor.manager,
        error: `${error}\n${tailOutput(output.text(), 500)}`.trim(),
      }
    }

    logger.info('Interpreter installed', {manager: descriptor.manager})
    return {installed: true, manager: descriptor.manager, error: null}
  } catch (error) {
    const errorMsg = toErrorMessage(error)
    logger.warning('Interpreter installation failed', {manager: descriptor.manager, error: errorMsg})
    return {installed: false, manager: descriptor.manager, error: `${commandLine} failed: ${errorMsg}`}
  }
}
