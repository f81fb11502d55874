/**
 * Logger
 *
 * Structured logging through pino. Every component gets a named logger; the
 * level comes from LOG_LEVEL and defaults to `info` (`silent` under tests).
 */

import pino, { type Logger as PinoLogger } from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

export type Logger = PinoLogger

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

/**
 * Resolve the log level from the environment.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase()
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel
  }
  return env.NODE_ENV === 'test' ? 'silent' : 'info'
}

const baseLogger = pino({ name: 'cypher-ogm', level: getLogLevel() })

/**
 * Create a child logger for a component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('executor')
 * logger.debug({ parameters: ['id'] }, 'Executing query')
 * ```
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}
