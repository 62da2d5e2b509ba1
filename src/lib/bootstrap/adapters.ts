import type {BootstrapDeps} from './run.js'
import type {ExecAdapter, ToolCacheAdapter, WhichAdapter} from './types.js'
import * as exec from '@actions/exec'
import * as io from '@actions/io'
import * as tc from '@actions/tool-cache'

import {getRunnerToolCache} from '../../utils/env.js'
import {spawnInherited} from '../../utils/process.js'
import {createLogger} from '../logger.js'

/**
 * Create exec adapter from @actions/exec
 */
export function createExecAdapter(): ExecAdapter {
  return {
    exec: exec.exec,
    getExecOutput: exec.getExecOutput,
  }
}

/**
 * Create PATH resolver from @actions/io. Missing tools resolve to an empty string.
 */
export function createWhichAdapter(): WhichAdapter {
  return {
    which: async (tool: string) => io.which(tool, false),
  }
}

/**
 * Create tool cache adapter from @actions/tool-cache
 */
export function createToolCacheAdapter(): ToolCacheAdapter {
  return {
    find: tc.find,
  }
}

/**
 * Production dependencies. The tool cache is only consulted when RUNNER_TOOL_CACHE is set.
 */
export function createDefaultDeps(): BootstrapDeps {
  return {
    logger: createLogger({component: 'bootstrap'}),
    execAdapter: createExecAdapter(),
    whichAdapter: createWhichAdapter(),
    toolCache: getRunnerToolCache() == null ? undefined : createToolCacheAdapter(),
    launcher: spawnInherited,
  }
}
