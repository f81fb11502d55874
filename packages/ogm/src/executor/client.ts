/**
 * Bolt Database Client
 *
 * Query execution and schema synchronisation shared by the Memgraph and
 * Neo4j clients. Vendors supply their schema statements and their query
 * builder.
 */

import { Neo4jError, type Record as Neo4jRecord } from 'neo4j-driver'
import { DatabaseError, GraphOgmError } from '../errors'
import { deserialize } from '../model/deserialize'
import type { QueryBuilder } from '../query'
import { ModelRegistry, diffDescriptors, type SchemaDescriptor } from '../schema'
import { createLogger } from '../utils/logger'
import type { BoltConnection } from './connection'
import type { DatabaseClient, Persistable, PropertyStore, QueryParameters, ResultRow, Vendor } from './provider'

const logger = createLogger('executor')

export interface ClientOptions {
  /** Definitions used to deserialize results (defaults to an empty registry) */
  registry?: ModelRegistry
  /** Side storage for `onDisk` fields */
  propertyStore?: PropertyStore
}

/**
 * Base client running queries over a Bolt connection.
 */
export abstract class BoltDatabaseClient implements DatabaseClient {
  abstract readonly vendor: Vendor

  readonly registry: ModelRegistry
  propertyStore?: PropertyStore

  constructor(
    protected readonly connection: BoltConnection,
    options: ClientOptions = {},
  ) {
    this.registry = options.registry ?? new ModelRegistry()
    this.propertyStore = options.propertyStore
  }

  abstract newQuery(): QueryBuilder

  abstract getConstraints(): Promise<SchemaDescriptor[]>
  abstract getIndexes(): Promise<SchemaDescriptor[]>
  abstract createConstraint(descriptor: SchemaDescriptor): Promise<void>
  abstract dropConstraint(descriptor: SchemaDescriptor): Promise<void>
  abstract createIndex(descriptor: SchemaDescriptor): Promise<void>
  abstract dropIndex(descriptor: SchemaDescriptor): Promise<void>

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  async execute(query: string, parameters: QueryParameters = {}): Promise<void> {
    this.logQuery(query, parameters)
    try {
      await this.connection.run(query, parameters)
    } catch (error) {
      throw this.wrapError(error, query, parameters)
    }
  }

  async *executeAndFetch(query: string, parameters: QueryParameters = {}): AsyncGenerator<ResultRow, void, undefined> {
    this.logQuery(query, parameters)
    try {
      for await (const record of this.connection.stream(query, parameters)) {
        yield this.toRow(record)
      }
    } catch (error) {
      throw this.wrapError(error, query, parameters)
    }
  }

  /**
   * Save nodes one after another, in order. Each instance takes its id.
   *
   * @example
   * ```typescript
   * await db.saveNodes([User.create({ id: 'u1' }), User.create({ id: 'u2' })])
   * ```
   */
  async saveNodes(nodes: readonly Persistable[]): Promise<void> {
    for (const node of nodes) {
      await node.save(this)
    }
  }

  /** Save relationships one after another, in order */
  async saveRelationships(relationships: readonly Persistable[]): Promise<void> {
    for (const relationship of relationships) {
      await relationship.save(this)
    }
  }

  async dropDatabase(): Promise<void> {
    await this.newQuery().match().node({ variable: 'n' }).delete('n', { detach: true }).execute()
  }

  async close(): Promise<void> {
    await this.connection.close()
  }

  // ===========================================================================
  // SCHEMA
  // ===========================================================================

  async ensureConstraints(constraints: readonly SchemaDescriptor[]): Promise<void> {
    const { missing, obsolete } = diffDescriptors(await this.getConstraints(), constraints)
    for (const descriptor of obsolete) {
      await this.dropConstraint(descriptor)
    }
    for (const descriptor of missing) {
      await this.createConstraint(descriptor)
    }
    logger.info({ created: missing.length, dropped: obsolete.length }, 'Synchronised constraints')
  }

  /**
   * Indexes the database manages itself (`owned`) are left in place.
   */
  async ensureIndexes(indexes: readonly SchemaDescriptor[]): Promise<void> {
    const { missing, obsolete } = diffDescriptors(await this.getIndexes(), indexes)
    const dropped = obsolete.filter((descriptor) => !descriptor.owned)
    for (const descriptor of dropped) {
      await this.dropIndex(descriptor)
    }
    for (const descriptor of missing) {
      await this.createIndex(descriptor)
    }
    logger.info({ created: missing.length, dropped: dropped.length }, 'Synchronised indexes')
  }

  /** Drop every constraint */
  async dropConstraints(): Promise<void> {
    await this.ensureConstraints([])
  }

  /** Drop every index the database does not own */
  async dropIndexes(): Promise<void> {
    await this.ensureIndexes([])
  }

  /** Run a query and collect its rows */
  protected async fetchAll(query: string, parameters: QueryParameters = {}): Promise<ResultRow[]> {
    const rows: ResultRow[] = []
    for await (const row of this.executeAndFetch(query, parameters)) {
      rows.push(row)
    }
    return rows
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private toRow(record: Neo4jRecord): ResultRow {
    const row: ResultRow = {}
    for (const [key, value] of Object.entries(record.toObject())) {
      row[key] = deserialize(value, this.registry)
    }
    return row
  }

  private logQuery(query: string, parameters: QueryParameters): void {
    logger.debug({ vendor: this.vendor, query, parameters: Object.keys(parameters) }, 'Executing query')
  }

  private wrapError(error: unknown, query: string, parameters: QueryParameters): Error {
    if (error instanceof GraphOgmError) return error

    const wrapped =
      error instanceof Neo4jError
        ? new DatabaseError(error.message, error.code, query, parameters, error)
        : error instanceof Error
          ? new DatabaseError(error.message, undefined, query, parameters, error)
          : new DatabaseError(String(error), undefined, query, parameters)

    logger.error({ vendor: this.vendor, query, code: wrapped.code, err: error }, 'Query failed')
    return wrapped
  }
}
