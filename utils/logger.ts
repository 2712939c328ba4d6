/**
 * Logger utility for arcfs
 *
 * Provides a simple logger factory that creates namespaced loggers
 * for the archive backends, layers and the CLI.
 */

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[arcfs-cli]')
 *
 * @example
 * ```typescript
 * const logger = createLogger('[arcfs:packed]')
 * logger.debug('header loaded', { files: 12 })  // only with ARCFS_DEBUG=1
 * logger.warn('extraction incomplete')
 * ```
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
    debug: (...args: unknown[]) => {
      // Enable by setting ARCFS_DEBUG=1
      if (typeof process !== 'undefined' && process.env?.ARCFS_DEBUG) {
        console.debug(prefix, ...args)
      }
    },
  }
}

/**
 * Default logger instance with [arcfs] prefix
 */
export const logger: Logger = createLogger('[arcfs]')
