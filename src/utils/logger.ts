/**
 * Logger Utility
 *
 * pino logger with pretty-print in development. Tests log through plain JSON.
 */

import pino from 'pino'

const isDev = process.env.NODE_ENV !== 'production'
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport:
    isDev && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
})

/** Logger type accepted by components that log */
export type Logger = pino.Logger

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}
