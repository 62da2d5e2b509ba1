import type {BootstrapConfig, ExecAdapter, Logger, ManifestResolution} from './types.js'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import {pathExists} from '../../utils/paths.js'
import {BootstrapError} from './errors.js'
import {runRequired} from './exec.js'

export interface DependencyDeps {
  readonly logger: Logger
  readonly execAdapter: ExecAdapter
}

/**
 * Find the requirements manifest.
 *
 * When only the fallback flat file exists it is copied to the primary location first.
 *
 * @throws BootstrapError if neither manifest exists
 */
export async function resolveManifest(config: BootstrapConfig, logger: Logger): Promise<ManifestResolution> {
  const {manifestPath, fallbackManifestPath} = config

  if (await pathExists(manifestPath)) {
    logger.debug('Using manifest', {path: manifestPath})
    return {path: manifestPath, source: 'primary'}
  }

  if (!(await pathExists(fallbackManifestPath))) {
    throw new BootstrapError(
      'install-dependencies',
      `Requirements manifest not found: neither ${manifestPath} nor ${fallbackManifestPath} exists`,
    )
  }

  await fs.mkdir(path.dirname(manifestPath), {recursive: true})
  await fs.copyFile(fallbackManifestPath, manifestPath)
  logger.info('Copied fallback manifest', {from: fallbackManifestPath, to: manifestPath})
  return {path: manifestPath, source: 'fallback'}
}

/**
 * Upgrade the packaging tools, then install the manifest, with the environment's interpreter.
 *
 * Both pip runs append to the install log.
 *
 * @throws BootstrapError if either step fails
 */
export async function installDependencies(
  config: BootstrapConfig,
  pythonPath: string,
  manifest: ManifestResolution,
  deps: DependencyDeps,
): Promise<void> {
  const {logger} = deps
  const logPath = config.installLogPath
  const hint = `see ${logPath} for details`

  await fs.mkdir(path.dirname(logPath), {recursive: true})

  logger.info('Upgrading packaging tools', {tools: config.packagingTools})
  await runRequired(
    'install-dependencies',
    pythonPath,
    ['-m', 'pip', 'install', '--upgrade', ...config.packagingTools, '--log', logPath],
    deps,
    {cwd: config.rootDir, hint},
  )

  logger.info('Installing requirements', {manifest: manifest.path})
  await runRequired(
    'install-dependencies',
    pythonPath,
    ['-m', 'pip', 'install', '-r', manifest.path, '--log', logPath],
    deps,
    {cwd: config.rootDir, hint},
  )

  logger.info('Dependencies installed', {manifest: manifest.path})
}
