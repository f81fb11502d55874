/**
 * Utilities Module
 */

export type { Prettify, UnionToIntersection, PropertyMap } from './types'
export { createLogger, getLogLevel } from './logger'
export type { Logger, LogLevel } from './logger'
