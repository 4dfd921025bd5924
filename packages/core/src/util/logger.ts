/**
 * @loopsheet/core - Logging
 *
 * Console logging with a component prefix, in the `[Component] message`
 * style used across the packages.
 */

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  /** Logger whose messages carry an extra `[scope]` prefix */
  child(scope: string): Logger
}

export interface ConsoleLoggerOptions {
  /** Print debug messages (default: false) */
  verbose?: boolean

  /** Component name printed in brackets */
  scope?: string

  /** Prefix each line with the wall-clock time (default: true) */
  timestamps?: boolean
}

/**
 * Format a date as HH:MM:SS.
 */
export function formatTime(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0')
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

/**
 * Create a logger that writes to the console.
 *
 * @example
 * ```typescript
 * const log = createConsoleLogger({ verbose: true, scope: 'Fetcher' })
 * log.info('Listening...')   // 12:00:01 - [Fetcher] Listening...
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false
  const timestamps = options.timestamps ?? true
  const scope = options.scope

  const format = (message: string): string => {
    const scoped = scope ? `[${scope}] ${message}` : message
    return timestamps ? `${formatTime(new Date())} - ${scoped}` : scoped
  }

  return {
    debug(message) {
      if (verbose) console.debug(format(message))
    },
    info(message) {
      console.log(format(message))
    },
    warn(message) {
      console.warn(format(message))
    },
    error(message) {
      console.error(format(message))
    },
    child(childScope) {
      return createConsoleLogger({
        verbose,
        timestamps,
        scope: scope ? `${scope}:${childScope}` : childScope
      })
    }
  }
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger
  }
}
