import type {OperatingSystem} from './types.js'
import {Buffer} from 'node:buffer'
import process from 'node:process'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {createMockExecAdapter, createMockLogger} from '../test-helpers.js'
import {createBootstrapConfig} from './config.js'
import {detectOperatingSystem, getInstallerDescriptor, INSTALLERS, installInterpreter} from './install.js'
import {SUPPORTED_OPERATING_SYSTEMS} from './types.js'

describe('detectOperatingSystem', () => {
  const originalEnv = process.env

  beforeEach(() => {
    process.env = {...originalEnv}
    delete process.env.RUNNER_OS
  })

  afterEach(() => {
    process.env = originalEnv
  })

  it('maps supported platforms to operating system families', () => {
    expect(detectOperatingSystem('linux')).toBe('linux')
    expect(detectOperatingSystem('darwin')).toBe('macos')
    expect(detectOperatingSystem('win32')).toBe('windows')
  })

  it('returns null for unsupported platforms', () => {
    expect(detectOperatingSystem('sunos')).toBeNull()
    expect(detectOperatingSystem('openbsd')).toBeNull()
  })

  it('maps an explicit platform regardless of RUNNER_OS', () => {
    process.env.RUNNER_OS = 'Windows'
    expect(detectOperatingSystem('linux')).toBe('linux')
  })
})

describe('getInstallerDescriptor', () => {
  it('builds the apt-get invocation on linux', () => {
    expect(getInstallerDescriptor('linux', '3.10')).toEqual({
      manager: 'apt-get',
      command: 'sudo',
      args: ['apt-get', 'install', '-y', 'python3.10', 'python3.10-venv'],
    })
  })

  it('builds the brew invocation on macos', () => {
    expect(getInstallerDescriptor('macos', '3.10')).toEqual({
      manager: 'brew',
      command: 'brew',
      args: ['install', 'python@3.10'],
    })
  })

  it('builds the winget invocation on windows', () => {
    expect(getInstallerDescriptor('windows', '3.10')).toEqual({
      manager: 'winget',
      command: 'winget',
      args: ['install', '--exact', '--silent', '--id', 'Python.Python.3.10'],
    })
  })

  it.each<[OperatingSystem, string[]]>([
    ['linux', ['apt-get', 'install', '-y', 'python3.10', 'python3.10-venv']],
    ['macos', ['install', 'python@3.10']],
    ['windows', ['install', '--exact', '--silent', '--id', 'Python.Python.3.10']],
  ])('names the minor version for a patch-level target on %s', (operatingSystem, args) => {
    expect(getInstallerDescriptor(operatingSystem, '3.10.12').args).toEqual(args)
  })

  it('has a descriptor for every supported operating system', () => {
    expect(Object.keys(INSTALLERS).sort()).toEqual([...SUPPORTED_OPERATING_SYSTEMS].sort())
  })
})

describe('installInterpreter', () => {
  const config = createBootstrapConfig('/srv/app')

  it.each<[OperatingSystem, string]>([
    ['linux', 'sudo'],
    ['macos', 'brew'],
    ['windows', 'winget'],
  ])('invokes exactly one installer on %s', async (operatingSystem, command) => {
    // #given
    const execAdapter = createMockExecAdapter()

    // #when
    const result = await installInterpreter(config, operatingSystem, {logger: createMockLogger(), execAdapter})

    // #then
    expect(result).toEqual({installed: true, manager: INSTALLERS[operatingSystem]('3.10').manager, error: null})
    expect(execAdapter.exec).toHaveBeenCalledTimes(1)
    expect(vi.mocked(execAdapter.exec).mock.calls[0]?.[0]).toBe(command)
  })

  it('installs the minor release when the target names a patch level', async () => {
    // #given
    const execAdapter = createMockExecAdapter()
    const patchConfig = createBootstrapConfig('/srv/app', {pythonVersion: '3.10.12'})

    // #when
    await installInterpreter(patchConfig, 'linux', {logger: createMockLogger(), execAdapter})

    // #then
    expect(vi.mocked(execAdapter.exec).mock.calls[0]?.slice(0, 2)).toEqual([
      'sudo',
      ['apt-get', 'install', '-y', 'python3.10', 'python3.10-venv'],
    ])
  })

  it('invokes nothing for an unrecognised operating system', async () => {
    // #given
    const execAdapter = createMockExecAdapter()
    const logger = createMockLogger()

    // #when
    const result = await installInterpreter(config, null, {logger, execAdapter, platform: 'aix'})

    // #then
    expect(result).toEqual({installed: false, manager: null, error: 'No interpreter installer for platform aix'})
    expect(execAdapter.exec).not.toHaveBeenCalled()
    expect(execAdapter.getExecOutput).not.toHaveBeenCalled()
  })

  it('reports a non-zero exit with captured output', async () => {
    // #given
    const execAdapter = createMockExecAdapter({
      exec: vi.fn(
        async (
          _cmd: string,
          _args?: string[],
          options?: {listeners?: {stderr?: (data: Buffer) => void}},
        ): Promise<number> => {
          options?.listeners?.stderr?.(Buffer.from('E: Unable to locate package python3.10\n'))
          return Promise.resolve(100)
        },
      ),
    })
    const logger = createMockLogger()

    // #when
    const result = await installInterpreter(config, 'linux', {logger, execAdapter})

    // #then
    expect(result).toEqual({
      installed: false,
      manager: 'apt-get',
      error:
        'sudo apt-get install -y python3.10 python3.10-venv returned exit code 100\nE: Unable to locate package python3.10',
    })
    expect(logger.warning).toHaveBeenCalledWith(
      'sudo apt-get install -y python3.10 python3.10-venv returned exit code 100',
      {output: 'E: Unable to locate package python3.10'},
    )
  })

  it('reports a thrown error without propagating it', async () => {
    // #given
    const execAdapter = createMockExecAdapter({
      exec: vi.fn().mockRejectedValue(new Error('Unable to locate executable file: brew')),
    })

    // #when
    const result = await installInterpreter(config, 'macos', {logger: createMockLogger(), execAdapter})

    // #then
    expect(result).toEqual({
      installed: false,
      manager: 'brew',
      error: 'brew install python@3.10 failed: Unable to locate executable file: brew',
    })
  })
})
