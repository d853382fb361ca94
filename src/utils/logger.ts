/**
 * Logger
 *
 * Filters log nothing by default. Construction is traced at debug level, and
 * combining filters whose hash producers cannot be shown equivalent is
 * reported at warn level.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Console logger tagging every line with `[prefix] [LEVEL]`.
 */
export function createConsoleLogger(prefix: string): Logger {
  const tag = (level: string, message: string) => `[${prefix}] [${level}] ${message}`
  return {
    debug: (message, ...args) => console.debug(tag('DEBUG', message), ...args),
    info: (message, ...args) => console.info(tag('INFO', message), ...args),
    warn: (message, ...args) => console.warn(tag('WARN', message), ...args),
    error: (message, error, ...args) =>
      error === undefined
        ? console.error(tag('ERROR', message), ...args)
        : console.error(tag('ERROR', message), error, ...args),
  }
}

export const consoleLogger: Logger = createConsoleLogger('bloom')

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

export let logger: Logger = noopLogger

/**
 * Route library logs somewhere, e.g. `setLogger(consoleLogger)` while
 * checking which filters get combined.
 */
export function setLogger(l: Logger): void {
  logger = l
}
