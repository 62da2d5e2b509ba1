import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import {fileURLToPath} from 'node:url'

import {getErrorCode} from './errors.js'

/**
 * Whether `target` exists. Errors other than ENOENT are rethrown.
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target)
    return true
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return false
    }
    throw error
  }
}

/**
 * Directory containing the module at `moduleUrl` (an `import.meta.url`).
 */
export function moduleDirectory(moduleUrl: string): string {
  return path.dirname(fileURLToPath(moduleUrl))
}
