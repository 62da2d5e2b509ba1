// Bootstrap module public exports
export {createDefaultDeps, createExecAdapter, createToolCacheAdapter, createWhichAdapter} from './adapters.js'
export {createBootstrapConfig} from './config.js'
export type {BootstrapConfigOverrides} from './config.js'
export {installDependencies, resolveManifest} from './dependencies.js'
export {buildEnvironment, getEnvironmentInterpreter} from './environment.js'
export {BootstrapError, isBootstrapError} from './errors.js'
export {runRequired} from './exec.js'
export {detectOperatingSystem, getInstallerDescriptor, INSTALLERS, installInterpreter} from './install.js'
export {launchApplication} from './launch.js'
export {getCandidateCommands, locateInterpreter, parseInterpreterVersion, verifyInterpreter, versionMatches} from './locate.js'
export {main, runBootstrap} from './run.js'
export type {BootstrapDeps} from './run.js'

// Types
export {SUPPORTED_OPERATING_SYSTEMS} from './types.js'
export type {
  BootstrapConfig,
  BootstrapResult,
  BootstrapState,
  BootstrapStep,
  EnvironmentResult,
  ExecAdapter,
  ExecOptions,
  ExecOutput,
  InstallerDescriptor,
  InterpreterInstallResult,
  InterpreterSource,
  LocatedInterpreter,
  Logger,
  ManifestResolution,
  ManifestSource,
  OperatingSystem,
  ProcessLauncher,
  ToolCacheAdapter,
  WhichAdapter,
} from './types.js'
