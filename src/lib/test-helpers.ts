import type {ExecAdapter, ProcessLauncher, ToolCacheAdapter, WhichAdapter} from './bootstrap/types.js'
import type {Logger} from './logger.js'
import {vi} from 'vitest'

/**
 * Mock logger for tests. All methods are vi.fn() spies.
 */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    error: vi.fn(),
  }
}

/**
 * Mock exec adapter: every command succeeds with empty output unless overridden.
 */
export function createMockExecAdapter(overrides: Partial<ExecAdapter> = {}): ExecAdapter {
  return {
    exec: vi.fn().mockResolvedValue(0),
    getExecOutput: vi.fn().mockResolvedValue({exitCode: 0, stdout: '', stderr: ''}),
    ...overrides,
  }
}

/**
 * Mock PATH resolver backed by a command → path table.
 */
export function createMockWhichAdapter(paths: Record<string, string> = {}): WhichAdapter {
  return {
    which: vi.fn(async (tool: string) => Promise.resolve(paths[tool] ?? '')),
  }
}

/**
 * Mock tool cache that never has a hit unless overridden.
 */
export function createMockToolCache(overrides: Partial<ToolCacheAdapter> = {}): ToolCacheAdapter {
  return {
    find: vi.fn().mockReturnValue(''),
    ...overrides,
  }
}

/**
 * Mock launcher resolving with the given exit code.
 */
export function createMockLauncher(exitCode = 0): ProcessLauncher {
  return vi.fn().mockResolvedValue(exitCode)
}
