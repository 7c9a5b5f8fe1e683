/**
 * Utilities
 */

export { createLogger, getLogger } from './logger.js'
export type { Logger } from './logger.js'
