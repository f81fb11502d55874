/**
 * Database Client Interface
 *
 * Everything the query builder and the model layer need from a database:
 * running queries, reading and changing its schema, and side storage for
 * large property values.
 */

import type { QueryBuilder } from '../query'
import type { ModelRegistry, SchemaDescriptor } from '../schema'

// =============================================================================
// RESULTS
// =============================================================================

/**
 * One result row: returned variable name to deserialized value.
 */
export type ResultRow = Record<string, unknown>

export type QueryParameters = Record<string, unknown>

export type Vendor = 'memgraph' | 'neo4j'

// =============================================================================
// PROPERTY STORE
// =============================================================================

/**
 * Side storage for fields declared `onDisk`, keyed by the numeric id of the
 * owning node or relationship.
 */
export interface PropertyStore {
  saveNodeProperty(nodeId: number, name: string, value: unknown): Promise<void>
  /** Resolves undefined when nothing is stored */
  loadNodeProperty(nodeId: number, name: string): Promise<unknown>
  saveRelationshipProperty(relationshipId: number, name: string, value: unknown): Promise<void>
  loadRelationshipProperty(relationshipId: number, name: string): Promise<unknown>
}

// =============================================================================
// DATABASE CLIENT
// =============================================================================

/**
 * Anything that writes itself through a client, such as a model node or
 * relationship.
 */
export interface Persistable {
  save(db: DatabaseClient): Promise<unknown>
}

/**
 * Schema operations of a client.
 */
export interface SchemaClient {
  getConstraints(): Promise<SchemaDescriptor[]>
  getIndexes(): Promise<SchemaDescriptor[]>
  createConstraint(descriptor: SchemaDescriptor): Promise<void>
  dropConstraint(descriptor: SchemaDescriptor): Promise<void>
  createIndex(descriptor: SchemaDescriptor): Promise<void>
  dropIndex(descriptor: SchemaDescriptor): Promise<void>

  /** Drop every constraint not in `constraints`, then create the missing ones */
  ensureConstraints(constraints: readonly SchemaDescriptor[]): Promise<void>

  /** Drop every index not in `indexes`, then create the missing ones */
  ensureIndexes(indexes: readonly SchemaDescriptor[]): Promise<void>
}

/**
 * A connection to Memgraph or Neo4j.
 */
export interface DatabaseClient extends SchemaClient {
  readonly vendor: Vendor

  /** Definitions used to deserialize returned nodes and relationships */
  readonly registry: ModelRegistry

  /** Side storage for `onDisk` fields, when configured */
  propertyStore?: PropertyStore

  /** Run a query for its side effects */
  execute(query: string, parameters?: QueryParameters): Promise<void>

  /** Run a query and stream its rows */
  executeAndFetch(query: string, parameters?: QueryParameters): AsyncGenerator<ResultRow, void, undefined>

  /** Delete every node and relationship */
  dropDatabase(): Promise<void>

  /** Query builder bound to this client, in its vendor's dialect */
  newQuery(): QueryBuilder

  close(): Promise<void>
}
