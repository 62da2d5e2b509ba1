import type {BootstrapStep} from './types.js'

/**
 * Fatal bootstrap failure. Raising one aborts the pipeline.
 */
export class BootstrapError extends Error {
  readonly step: BootstrapStep

  constructor(step: BootstrapStep, message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'BootstrapError'
    this.step = step
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError
}
