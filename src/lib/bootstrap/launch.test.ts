import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {createMockLauncher, createMockLogger} from '../test-helpers.js'
import {createBootstrapConfig} from './config.js'
import {launchApplication} from './launch.js'

describe('launchApplication', () => {
  let rootDir: string

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'launch-test-'))
  })

  afterEach(async () => {
    await fs.rm(rootDir, {recursive: true, force: true})
  })

  async function writeEntryPoint(entryPoint: string): Promise<void> {
    await fs.mkdir(path.dirname(entryPoint), {recursive: true})
    await fs.writeFile(entryPoint, 'print("hello")\n')
  }

  it('runs the entry point with the environment interpreter', async () => {
    // #given
    const config = createBootstrapConfig(rootDir)
    await writeEntryPoint(config.entryPoint)
    const launcher = createMockLauncher(0)
    const python = path.join(rootDir, 'venv', 'bin', 'python')

    // #when
    const exitCode = await launchApplication(config, python, {logger: createMockLogger(), launcher})

    // #then
    expect(exitCode).toBe(0)
    expect(launcher).toHaveBeenCalledWith(python, [config.entryPoint], {cwd: rootDir})
  })

  it('throws without launching when the entry point is missing', async () => {
    // #given
    const config = createBootstrapConfig(rootDir)
    const launcher = createMockLauncher(0)

    // #when
    const promise = launchApplication(config, 'python', {logger: createMockLogger(), launcher})

    // #then
    await expect(promise).rejects.toThrow(`Entry point not found: ${config.entryPoint}`)
    await expect(promise).rejects.toHaveProperty('step', 'launch')
    expect(launcher).not.toHaveBeenCalled()
  })

  it('throws when the application exits non-zero', async () => {
    // #given
    const config = createBootstrapConfig(rootDir)
    await writeEntryPoint(config.entryPoint)

    // #when
    const promise = launchApplication(config, 'python', {logger: createMockLogger(), launcher: createMockLauncher(3)})

    // #then
    await expect(promise).rejects.toThrow('Application exited with code 3')
  })

  it('throws when the interpreter cannot be started', async () => {
    // #given
    const config = createBootstrapConfig(rootDir)
    await writeEntryPoint(config.entryPoint)
    const launcher = vi.fn().mockRejectedValue(new Error('spawn python ENOENT'))

    // #when
    const promise = launchApplication(config, 'python', {logger: createMockLogger(), launcher})

    // #then
    await expect(promise).rejects.toThrow(`python ${config.entryPoint} failed: spawn python ENOENT`)
  })
})
