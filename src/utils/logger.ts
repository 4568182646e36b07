/**
 * Logging used across the merge pipeline
 * @module utils/logger
 */

/**
 * Logger interface for pipeline logging
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Creates a console logger that drops messages below `minLevel`
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]

  return {
    debug: (message, context) => {
      // Use console.log for debug since console.debug may not be available in all environments
      if (enabled('debug')) console.log(`[DEBUG] ${message}`, context ?? '')
    },
    info: (message, context) => {
      if (enabled('info')) console.log(`[INFO] ${message}`, context ?? '')
    },
    warn: (message, context) => {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, context ?? '')
    },
    error: (message, context) => {
      if (enabled('error')) console.error(`[ERROR] ${message}`, context ?? '')
    },
  }
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component or source name
 */
export function createPrefixedLogger(
  name: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}
