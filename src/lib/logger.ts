import * as core from '@actions/core'

export interface LogContext {
  readonly [key: string]: unknown
}

export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void
  readonly info: (message: string, context?: LogContext) => void
  readonly warning: (message: string, context?: LogContext) => void
  readonly error: (message: string, context?: LogContext) => void
}

type LogLevel = 'debug' | 'error' | 'info' | 'warning'

function serializeError(error: Error): Record<string, unknown> {
  return {
    message: error.message,
    name: error.name,
    stack: error.stack,
  }
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  baseContext: LogContext,
  callContext?: LogContext,
): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...baseContext,
    ...callContext,
  }

  if (callContext != null && callContext.error instanceof Error) {
    entry.error = serializeError(callContext.error)
  }

  return JSON.stringify(entry)
}

/**
 * Create a structured logger. Every line is a JSON object carrying the base context
 * merged with the per-call context.
 *
 * Debug entries are written only when RUNNER_DEBUG is on, since the launched application
 * shares stdout.
 */
export function createLogger(baseContext: LogContext): Logger {
  return {
    debug: (message: string, context?: LogContext): void => {
      if (core.isDebug()) {
        core.debug(formatLogEntry('debug', message, baseContext, context))
      }
    },
    info: (message: string, context?: LogContext): void => {
      core.info(formatLogEntry('info', message, baseContext, context))
    },
    warning: (message: string, context?: LogContext): void => {
      core.warning(formatLogEntry('warning', message, baseContext, context))
    },
    error: (message: string, context?: LogContext): void => {
      core.error(formatLogEntry('error', message, baseContext, context))
    },
  }
}

/**
 * Derive a logger that adds `context` to every entry.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  return {
    debug: (message, callContext) => logger.debug(message, {...context, ...callContext}),
    info: (message, callContext) => logger.info(message, {...context, ...callContext}),
    warning: (message, callContext) => logger.warning(message, {...context, ...callContext}),
    error: (message, callContext) => logger.error(message, {...context, ...callContext}),
  }
}
