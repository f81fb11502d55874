/**
 * Shared Utility Types
 */

/**
 * Flatten complex intersection types for better IDE display.
 */
export type Prettify<T> = {
  [K in keyof T]: T[K]
} & {}

/**
 * Convert a union type to an intersection type.
 */
export type UnionToIntersection<U> = (U extends unknown ? (k: U) => void : never) extends (
  k: infer I,
) => void
  ? I
  : never

/**
 * Property bag stored on a node or relationship.
 */
export type PropertyMap = Record<string, unknown>
