import type {BootstrapConfig} from './types.js'
import * as path from 'node:path'
import {validateNonEmptyString, validateVersionString} from '../../utils/validation.js'
import {
  DEFAULT_ENTRY_POINT,
  DEFAULT_ENVIRONMENT_DIR,
  DEFAULT_FALLBACK_MANIFEST_PATH,
  DEFAULT_INSTALL_LOG_PATH,
  DEFAULT_MANIFEST_PATH,
  DEFAULT_PACKAGING_TOOLS,
  DEFAULT_PYTHON_VERSION,
} from '../constants.js'

/**
 * Values that may replace the defaults. Relative paths resolve against the root directory.
 */
export type BootstrapConfigOverrides = Partial<Omit<BootstrapConfig, 'rootDir'>>

/**
 * Build the immutable bootstrap configuration.
 *
 * @param rootDir - Directory the bootstrap script lives in
 * @param overrides - Replacements for the built-in defaults
 * @throws Error if the version or any path is invalid
 */
export function createBootstrapConfig(rootDir: string, overrides: BootstrapConfigOverrides = {}): BootstrapConfig {
  const root = path.resolve(validateNonEmptyString(rootDir, 'rootDir'))
  const resolve = (value: string, fieldName: string): string =>
    path.resolve(root, validateNonEmptyString(value, fieldName))

  const packagingTools = overrides.packagingTools ?? DEFAULT_PACKAGING_TOOLS
  for (const tool of packagingTools) {
    validateNonEmptyString(tool, 'packagingTools')
  }

  return Object.freeze({
    pythonVersion: validateVersionString(overrides.pythonVersion ?? DEFAULT_PYTHON_VERSION, 'pythonVersion'),
    rootDir: root,
    environmentDir: resolve(overrides.environmentDir ?? DEFAULT_ENVIRONMENT_DIR, 'environmentDir'),
    manifestPath: resolve(overrides.manifestPath ?? DEFAULT_MANIFEST_PATH, 'manifestPath'),
    fallbackManifestPath: resolve(
      overrides.fallbackManifestPath ?? DEFAULT_FALLBACK_MANIFEST_PATH,
      'fallbackManifestPath',
    ),
    entryPoint: resolve(overrides.entryPoint ?? DEFAULT_ENTRY_POINT, 'entryPoint'),
    installLogPath: resolve(overrides.installLogPath ?? DEFAULT_INSTALL_LOG_PATH, 'installLogPath'),
    packagingTools: Object.freeze([...packagingTools]),
  })
}
