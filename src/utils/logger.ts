/**
 * Standardized Logging Utilities
 *
 * Provides a consistent logging interface with standard Unicode symbols.
 * Centralizes console output formatting across all section scrapers.
 */

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error' | 'skip'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  skip: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * Resolves a LOG_LEVEL value to its priority. Unknown or missing values
 * fall back to `info`.
 */
export function resolveLogLevel(value: string | undefined): number {
  const normalized = value?.trim().toLowerCase() ?? ''
  return isLogLevel(normalized) ? LOG_LEVELS[normalized] : LOG_LEVELS.info
}

let currentLevelPriority = resolveLogLevel(process.env.LOG_LEVEL)

/**
 * Overrides the level read from the environment at startup.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelPriority = LOG_LEVELS[level]
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelPriority
}

export const log = {
  /**
   * General info information
   */
  info: (message: string): void => {
    if (shouldLog('info')) console.info(message)
  },

  /**
   * General debug information
   */
  debug: (message: string): void => {
    if (shouldLog('debug')) console.debug(message)
  },

  /**
   * Successful operation (✓)
   */
  success: (message: string): void => {
    if (shouldLog('success')) console.info(`✓ ${message}`)
  },

  /**
   * Warning message (⚠)
   */
  warning: (message: string): void => {
    if (shouldLog('warn')) console.warn(`⚠ ${message}`)
  },

  /**
   * Error message (✗)
   */
  error: (message: string): void => {
    if (shouldLog('error')) console.error(`✗ ${message}`)
  },

  /**
   * Skipped operation (⊳)
   */
  skip: (message: string): void => {
    if (shouldLog('skip')) console.debug(`⊳ ${message}`)
  },
}
