/**
 * Returned Entity Helpers
 *
 * Reading ids and properties out of deserialized rows, and the comparisons
 * `load` runs against them.
 */

import { isDeepStrictEqual } from 'node:util'
import { DatabaseError, ValidationError } from '../errors'
import type { ResultRow } from '../executor/provider'
import { TemporalValue } from '../serializer'
import type { PropertyMap } from '../utils'
import { GraphNode, GraphRelationship } from './graph-object'

export interface StoredNode {
  id: number
  properties: PropertyMap
}

export interface StoredRelationship extends StoredNode {
  startId: number
  endId: number
}

/**
 * Anything with the shape of a model instance that has been saved.
 */
interface SavedEntity {
  readonly id: number | null
  readonly properties: object
}

function entries(value: object): PropertyMap {
  return Object.fromEntries(Object.entries(value))
}

function isSavedEntity(value: unknown): value is SavedEntity {
  return typeof value === 'object' && value !== null && 'id' in value && 'properties' in value
}

/**
 * Id and properties of a returned node, whether it was dispatched to a model
 * or not.
 */
export function readNode(row: ResultRow, variable: string): StoredNode {
  const value = row[variable]
  if (value instanceof GraphNode) {
    return { id: value.id, properties: value.properties }
  }
  if (isSavedEntity(value) && typeof value.id === 'number') {
    return { id: value.id, properties: entries(value.properties) }
  }
  throw new DatabaseError(`Expected a node in column '${variable}'`)
}

export function readRelationship(row: ResultRow, variable: string): StoredRelationship {
  const value = row[variable]
  if (value instanceof GraphRelationship) {
    return { id: value.id, startId: value.startId, endId: value.endId, properties: value.properties }
  }
  if (
    isSavedEntity(value) &&
    typeof value.id === 'number' &&
    'startId' in value &&
    typeof value.startId === 'number' &&
    'endId' in value &&
    typeof value.endId === 'number'
  ) {
    return { id: value.id, startId: value.startId, endId: value.endId, properties: entries(value.properties) }
  }
  throw new DatabaseError(`Expected a relationship in column '${variable}'`)
}

/**
 * Read at most `limit` rows, closing the stream after.
 */
export async function collectRows(
  rows: AsyncGenerator<ResultRow, void, undefined>,
  limit: number,
): Promise<ResultRow[]> {
  const collected: ResultRow[] = []
  for await (const row of rows) {
    collected.push(row)
    if (collected.length >= limit) break
  }
  return collected
}

function sameValue(local: unknown, stored: unknown): boolean {
  if (local instanceof TemporalValue && stored instanceof TemporalValue) {
    return local.toCypher() === stored.toCypher()
  }
  return isDeepStrictEqual(local, stored)
}

function formatValue(value: unknown): string {
  if (typeof value === 'bigint') return `${value}n`
  if (value instanceof TemporalValue) return value.toCypher()
  return JSON.stringify(value) ?? String(value)
}

/**
 * Fail when a field set on the instance disagrees with the stored entity.
 */
export function assertNoConflicts(entity: string, local: PropertyMap, stored: PropertyMap): void {
  for (const [name, storedValue] of Object.entries(stored)) {
    const localValue = local[name]
    if (localValue === undefined || sameValue(localValue, storedValue)) continue
    throw new ValidationError(
      `${entity}.${name} is set to ${formatValue(localValue)} but the stored value is ${formatValue(storedValue)}`,
      name,
      formatValue(storedValue),
      localValue,
    )
  }
}
