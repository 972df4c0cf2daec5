/**
 * Logger configuration.
 *
 * forkline logs through a single module-level logger. Applications inject their
 * own implementation to control levels and formatting.
 */

import type { Logger } from './types.js'

/**
 * Default logger implementation.
 *
 * Only logs warnings and errors to console. Debug and info are no-ops.
 */
const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
}

/**
 * Global logger instance.
 */
export let logger: Logger = defaultLogger

/**
 * Replaces the global logger.
 *
 * @param customLogger - The logger implementation to use
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'forkline'
 *
 * configureLogging(pino({ level: 'debug' }))
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Builds a log line in the `key=<value>, key=<value> | message` form used across forkline.
 *
 * @param fields - Values to report, in order
 * @param message - What happened
 * @returns The formatted line
 *
 * @example
 * ```typescript
 * logLine({ turn_id: 3, branch: 0 }, 'evicted oldest turn')
 * // 'turn_id=<3>, branch=<0> | evicted oldest turn'
 * ```
 */
export function logLine(fields: Record<string, string | number | undefined>, message: string): string {
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=<${value}>`)
  return pairs.length > 0 ? `${pairs.join(', ')} | ${message}` : message
}
