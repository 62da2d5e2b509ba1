import type {Buffer} from 'node:buffer'

import type {Logger} from '../logger.js'

// Re-export Logger for convenience in bootstrap modules
export type {Logger}

/**
 * Operating system families with a known interpreter installer
 */
export const SUPPORTED_OPERATING_SYSTEMS = ['linux', 'macos', 'windows'] as const
export type OperatingSystem = (typeof SUPPORTED_OPERATING_SYSTEMS)[number]

/**
 * Pipeline states, in execution order. ABORT is entered from any step on a fatal error.
 */
export type BootstrapState =
  | 'START'
  | 'LOCATE'
  | 'INSTALL_INTERPRETER'
  | 'BUILD_ENV'
  | 'INSTALL_DEPS'
  | 'LAUNCH'
  | 'DONE'
  | 'ABORT'

/**
 * Step that raised a fatal error
 */
export type BootstrapStep = 'locate' | 'install-interpreter' | 'build-environment' | 'install-dependencies' | 'launch'

/**
 * Immutable bootstrap configuration. All paths are absolute.
 */
export interface BootstrapConfig {
  readonly pythonVersion: string
  readonly rootDir: string
  readonly environmentDir: string
  readonly manifestPath: string
  readonly fallbackManifestPath: string
  readonly entryPoint: string
  readonly installLogPath: string
  readonly packagingTools: readonly string[]
}

/**
 * Where a validated interpreter came from
 */
export type InterpreterSource = 'tool-cache' | 'path'

export interface LocatedInterpreter {
  readonly path: string
  readonly version: string
  readonly source: InterpreterSource
}

/**
 * Declarative package manager invocation for one operating system
 */
export interface InstallerDescriptor {
  readonly manager: string
  readonly command: string
  readonly args: readonly string[]
}

/**
 * Interpreter installation result
 */
export interface InterpreterInstallResult {
  readonly installed: boolean
  readonly manager: string | null
  readonly error: string | null
}

/**
 * Environment builder result
 */
export interface EnvironmentResult {
  readonly path: string
  readonly pythonPath: string
  readonly created: boolean
}

export type ManifestSource = 'primary' | 'fallback'

export interface ManifestResolution {
  readonly path: string
  readonly source: ManifestSource
}

/**
 * Bootstrap result summary
 */
export interface BootstrapResult {
  readonly pythonPath: string
  readonly pythonVersion: string
  readonly interpreterSource: InterpreterSource
  readonly environmentCreated: boolean
  readonly manifestSource: ManifestSource
  readonly exitCode: number
  readonly duration: number
}

/**
 * Adapter for exec operations (for testing)
 */
export interface ExecAdapter {
  readonly exec: (commandLine: string, args?: string[], options?: ExecOptions) => Promise<number>
  readonly getExecOutput: (commandLine: string, args?: string[], options?: ExecOptions) => Promise<ExecOutput>
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: Record<string, string>
  readonly silent?: boolean
  readonly ignoreReturnCode?: boolean
  readonly listeners?: {
    readonly stdout?: (data: Buffer) => void
    readonly stderr?: (data: Buffer) => void
  }
}

export interface ExecOutput {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

/**
 * Adapter for command resolution against PATH (for testing).
 * Returns an empty string when the tool is not found.
 */
export interface WhichAdapter {
  readonly which: (tool: string) => Promise<string>
}

/**
 * Adapter for the runner tool-cache lookup (for testing)
 */
export interface ToolCacheAdapter {
  readonly find: (toolName: string, versionSpec: string, arch?: string) => string
}

/**
 * Runs a process with inherited standard streams and resolves with its exit code
 */
export type ProcessLauncher = (command: string, args: readonly string[], options: {cwd: string}) => Promise<number>
