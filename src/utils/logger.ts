/**
 * Standardized Logging Utilities
 *
 * Console-backed logger with standard Unicode symbols. The threshold comes
 * from LOG_LEVEL and is read on every call, so it can change at runtime.
 */

type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error' | 'skip'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  skip: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value)
}

export function currentLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase()
  return configured && isLogLevel(configured) ? configured : 'info'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel()]
}

export interface Logger {
  info(message: string): void
  debug(message: string): void
  success(message: string): void
  warning(message: string): void
  error(message: string): void
  skip(message: string): void
}

/**
 * Creates a logger whose messages carry a `[scope]` prefix
 */
export function createLogger(scope?: string): Logger {
  const format = (message: string): string =>
    scope ? `[${scope}] ${message}` : message

  return {
    info: (message) => {
      if (shouldLog('info')) console.info(format(message))
    },

    debug: (message) => {
      if (shouldLog('debug')) console.debug(format(message))
    },

    /**
     * Successful operation (✓)
     */
    success: (message) => {
      if (shouldLog('success')) console.info(`✓ ${format(message)}`)
    },

    /**
     * Warning message (⚠)
     */
    warning: (message) => {
      if (shouldLog('warn')) console.warn(`⚠ ${format(message)}`)
    },

    /**
     * Error message (✗)
     */
    error: (message) => {
      if (shouldLog('error')) console.error(`✗ ${format(message)}`)
    },

    /**
     * Skipped element (⊳)
     */
    skip: (message) => {
      if (shouldLog('skip')) console.debug(`⊳ ${format(message)}`)
    },
  }
}

export const log = createLogger()
