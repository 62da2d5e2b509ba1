/**
 * Render a command line for log messages and diagnostics.
 * Arguments containing whitespace are double-quoted.
 */
export function formatCommandLine(command: string, args: readonly string[] = []): string {
  return [command, ...args].map(part => (/\s/.test(part) ? `"${part}"` : part)).join(' ')
}

/**
 * Keep the last `length` characters of subprocess output.
 * @throws {Error} If length is negative or not a finite number
 */
export function tailOutput(output: string, length: number): string {
  if (length < 0 || !Number.isFinite(length)) {
    throw new Error(`Invalid tail length: ${length}`)
  }
  const trimmed = output.trim()
  if (trimmed.length <= length) {
    return trimmed
  }
  return trimmed.slice(trimmed.length - length)
}
