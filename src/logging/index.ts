/**
 * Logging module exports.
 *
 * Provides a module-level logger that applications can replace with their own
 * implementation.
 */

export { configureLogging, logLine, logger } from './logger.js'
export type { Logger } from './types.js'
