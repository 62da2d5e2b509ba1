import type {BootstrapConfigOverrides} from './config.js'
import type {
  BootstrapConfig,
  BootstrapResult,
  BootstrapState,
  ExecAdapter,
  Logger,
  ProcessLauncher,
  ToolCacheAdapter,
  WhichAdapter,
} from './types.js'
import * as core from '@actions/core'

import {toError, toErrorMessage} from '../../utils/errors.js'
import {withContext} from '../logger.js'
import {createBootstrapConfig} from './config.js'
import {installDependencies, resolveManifest} from './dependencies.js'
import {buildEnvironment} from './environment.js'
import {BootstrapError, isBootstrapError} from './errors.js'
import {detectOperatingSystem, installInterpreter} from './install.js'
import {launchApplication} from './launch.js'
import {locateInterpreter} from './locate.js'

export interface BootstrapDeps {
  readonly logger: Logger
  readonly execAdapter: ExecAdapter
  readonly whichAdapter: WhichAdapter
  readonly toolCache?: ToolCacheAdapter
  readonly launcher: ProcessLauncher
  readonly platform?: NodeJS.Platform
}

/**
 * Run the bootstrap pipeline.
 *
 * This function orchestrates:
 * 1. Locating a matching interpreter
 * 2. Installing it with the OS package manager when none is found
 * 3. Creating the environment directory
 * 4. Installing the requirements manifest
 * 5. Launching the application
 *
 * A fatal error stops the pipeline, is reported through core.setFailed and yields null.
 */
export async function runBootstrap(config: BootstrapConfig, deps: BootstrapDeps): Promise<BootstrapResult | null> {
  const startTime = Date.now()
  const {logger, execAdapter, whichAdapter, toolCache, launcher, platform} = deps

  let state: BootstrapState = 'START'
  const transition = (next: BootstrapState): void => {
    logger.debug('State transition', {from: state, to: next})
    state = next
  }

  try {
    logger.info('Starting bootstrap', {version: config.pythonVersion, root: config.rootDir})
    const operatingSystem = detectOperatingSystem(platform)

    transition('LOCATE')
    const locateDeps = {
      logger: withContext(logger, {step: 'locate'}),
      execAdapter,
      whichAdapter,
      toolCache,
      operatingSystem,
    }
    let interpreter = await locateInterpreter(config, locateDeps)

    if (interpreter == null) {
      transition('INSTALL_INTERPRETER')
      const installLogger = withContext(logger, {step: 'install-interpreter'})
      const installResult = await installInterpreter(config, operatingSystem, {
        logger: installLogger,
        execAdapter,
        platform,
      })
      if (installResult.installed) {
        interpreter = await locateInterpreter(config, locateDeps)
      }
      if (interpreter == null) {
        const reason = installResult.error ?? `installed with ${installResult.manager ?? 'package manager'} but not found`
        throw new BootstrapError('install-interpreter', `Python ${config.pythonVersion} is not available: ${reason}`)
      }
    }

    transition('BUILD_ENV')
    const environment = await buildEnvironment(config, interpreter.path, operatingSystem, {
      logger: withContext(logger, {step: 'build-environment'}),
      execAdapter,
    })

    transition('INSTALL_DEPS')
    const dependencyLogger = withContext(logger, {step: 'install-dependencies'})
    const manifest = await resolveManifest(config, dependencyLogger)
    await installDependencies(config, environment.pythonPath, manifest, {logger: dependencyLogger, execAdapter})

    transition('LAUNCH')
    const exitCode = await launchApplication(config, environment.pythonPath, {
      logger: withContext(logger, {step: 'launch'}),
      launcher,
    })

    transition('DONE')
    const duration = Date.now() - startTime
    logger.info('Bootstrap complete', {duration})

    return {
      pythonPath: interpreter.path,
      pythonVersion: interpreter.version,
      interpreterSource: interpreter.source,
      environmentCreated: environment.created,
      manifestSource: manifest.source,
      exitCode,
      duration,
    }
  } catch (error) {
    const message = toErrorMessage(error)
    logger.error('Bootstrap failed', {
      state,
      step: isBootstrapError(error) ? error.step : null,
      error: toError(error),
    })
    transition('ABORT')
    core.setFailed(message)
    return null
  }
}

/**
 * Build the configuration for `rootDir` and run the pipeline.
 */
export async function main(
  rootDir: string,
  deps: BootstrapDeps,
  overrides: BootstrapConfigOverrides = {},
): Promise<BootstrapResult | null> {
  let config: BootstrapConfig
  try {
    config = createBootstrapConfig(rootDir, overrides)
  } catch (error) {
    core.setFailed(`Invalid configuration: ${toErrorMessage(error)}`)
    return null
  }
  return runBootstrap(config, deps)
}
