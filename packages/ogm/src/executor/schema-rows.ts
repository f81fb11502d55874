/**
 * Readers for the rows of schema listing queries.
 */

import { DatabaseError } from '../errors'
import type { ResultRow } from './provider'

export function readString(row: ResultRow, column: string): string {
  const value = row[column]
  if (typeof value !== 'string') {
    throw new DatabaseError(`Expected text in column '${column}', got ${typeof value}`)
  }
  return value
}

export function readOptionalString(row: ResultRow, column: string): string | undefined {
  const value = row[column]
  return typeof value === 'string' ? value : undefined
}

/**
 * A property column: null, one name, or a list of names.
 */
export function readStrings(row: ResultRow, column: string): string[] {
  const value = row[column]
  if (value === null || value === undefined) return []
  if (typeof value === 'string') return [value]
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value
  }
  throw new DatabaseError(`Expected property names in column '${column}'`)
}

export function readBoolean(row: ResultRow, column: string): boolean {
  const value = row[column]
  if (typeof value !== 'boolean') {
    throw new DatabaseError(`Expected a boolean in column '${column}', got ${typeof value}`)
  }
  return value
}
