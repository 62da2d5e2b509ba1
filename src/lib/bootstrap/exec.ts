import type {Buffer} from 'node:buffer'
import type {BootstrapStep, ExecAdapter, Logger} from './types.js'

import {toErrorMessage} from '../../utils/errors.js'
import {formatCommandLine, tailOutput} from '../../utils/format.js'
import {OUTPUT_TAIL_LENGTH} from '../constants.js'
import {BootstrapError} from './errors.js'

export interface CapturedOutput {
  readonly listeners: {
    readonly stdout: (data: Buffer) => void
    readonly stderr: (data: Buffer) => void
  }
  readonly text: () => string
}

/**
 * Collect stdout and stderr of a command into one string, in arrival order.
 */
export function captureOutput(): CapturedOutput {
  let output = ''
  const append = (data: Buffer): void => {
    output += data.toString()
  }
  return {listeners: {stdout: append, stderr: append}, text: () => output}
}

/**
 * Run a command whose failure aborts the bootstrap.
 *
 * Output is captured and the tail of it logged when the command fails. `hint` is
 * appended to the error message.
 *
 * @throws BootstrapError on a non-zero exit or when the command cannot be started
 */
export async function runRequired(
  step: BootstrapStep,
  command: string,
  args: readonly string[],
  deps: {readonly logger: Logger; readonly execAdapter: ExecAdapter},
  options: {readonly cwd?: string; readonly hint?: string} = {},
): Promise<void> {
  const {logger, execAdapter} = deps
  const commandLine = formatCommandLine(command, args)
  const suffix = options.hint == null ? '' : `; ${options.hint}`

  const output = captureOutput()
  let exitCode: number
  try {
    exitCode = await execAdapter.exec(command, [...args], {
      cwd: options.cwd,
      listeners: output.listeners,
      ignoreReturnCode: true,
    })
  } catch (error) {
    throw new BootstrapError(step, `${commandLine} failed: ${toErrorMessage(error)}${suffix}`, {cause: error})
  }

  if (exitCode !== 0) {
    logger.error(`${commandLine} returned exit code ${exitCode}`, {output: tailOutput(output.text(), OUTPUT_TAIL_LENGTH)})
    throw new BootstrapError(step, `${commandLine} returned exit code ${exitCode}${suffix}`)
  }
}
