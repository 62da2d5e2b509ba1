import {spawn} from 'node:child_process'
import {constants} from 'node:os'

/**
 * Exit status for a child killed by `signal`, following the shell convention of 128 + signal number.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal)
  return 128 + (entry?.[1] ?? 0)
}

/**
 * Spawn a process that shares this process's stdin, stdout and stderr and resolve with its exit code.
 */
export async function spawnInherited(command: string, args: readonly string[], options: {cwd: string}): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {cwd: options.cwd, stdio: 'inherit'})

    child.on('error', reject)
    child.on('close', (code, signal) => {
      if (code != null) {
        resolve(code)
      } else if (signal != null) {
        resolve(signalExitCode(signal))
      } else {
        resolve(1)
      }
    })
  })
}
