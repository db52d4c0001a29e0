/**
 * Logging
 *
 * Components take a Logger in their dependencies. The console logger prefixes
 * every line with a scope tag and drops lines below its threshold.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogContext = Record<string, unknown>

export type Logger = {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function createConsoleLogger(scope = 'lessonbook', level: LogLevel = 'info'): Logger {
  const threshold = RANK[level]

  function write(
    at: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: LogContext
  ): void {
    if (RANK[at] < threshold) return
    const line = `[${scope}] ${message}`
    if (context && Object.keys(context).length > 0) sink(line, context)
    else sink(line)
  }

  return {
    debug: (message, context) => write('debug', console.debug, message, context),
    info: (message, context) => write('info', console.info, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
  }
}

const noop = (): void => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}
