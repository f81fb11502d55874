/**
 * Neo4j Client
 */

import { loadConnectionConfig, parseConnectionConfig, type ConnectionConfigInput } from '../../config'
import { UsageError } from '../../errors'
import { Neo4jQueryBuilder } from '../../query/dialects'
import type { SchemaDescriptor } from '../../schema'
import { escapeName, toCypherLabels } from '../../serializer'
import { BoltDatabaseClient, type ClientOptions } from '../client'
import { ConnectionManager, type BoltConnection } from '../connection'
import { readOptionalString, readString, readStrings } from '../schema-rows'

export interface Neo4jClientOptions extends ClientOptions {
  /** Connection settings; read from `NEO4J_*` variables when omitted */
  config?: ConnectionConfigInput
  /** Use an existing connection instead of opening one */
  connection?: BoltConnection
}

const UNIQUE_TYPES = new Set(['UNIQUENESS', 'NODE_PROPERTY_UNIQUENESS'])
const EXISTS_TYPES = new Set(['NODE_PROPERTY_EXISTENCE'])

/**
 * Name for a schema object the database has not named yet.
 */
export function schemaObjectName(descriptor: SchemaDescriptor): string {
  const parts = [descriptor.kind, descriptor.label, ...descriptor.properties]
  return parts.join('_').replace(/[^A-Za-z0-9_]/g, '_')
}

function nameOf(descriptor: SchemaDescriptor): string {
  return escapeName(descriptor.name ?? schemaObjectName(descriptor))
}

function propertyTuple(properties: readonly string[]): string {
  const list = properties.map((property) => `n.${escapeName(property)}`)
  return list.length === 1 ? `${list[0]}` : `(${list.join(', ')})`
}

/**
 * Client for Neo4j.
 *
 * Schema objects are created under a name and dropped by it. Lookup indexes
 * and the indexes backing constraints belong to the database and are never
 * dropped by {@link ensureIndexes}.
 */
export class Neo4jClient extends BoltDatabaseClient {
  readonly vendor = 'neo4j' as const

  constructor(options: Neo4jClientOptions = {}) {
    super(
      options.connection ??
        new ConnectionManager(options.config ? parseConnectionConfig(options.config) : loadConnectionConfig('neo4j')),
      options,
    )
  }

  newQuery(): Neo4jQueryBuilder {
    return new Neo4jQueryBuilder(this)
  }

  async getIndexes(): Promise<SchemaDescriptor[]> {
    const rows = await this.fetchAll(
      'SHOW INDEXES YIELD name, type, entityType, labelsOrTypes, properties, owningConstraint',
    )
    const indexes: SchemaDescriptor[] = []
    for (const row of rows) {
      if (readString(row, 'entityType') !== 'NODE') continue
      const [label = ''] = readStrings(row, 'labelsOrTypes')
      indexes.push({
        kind: 'index',
        label,
        properties: readStrings(row, 'properties'),
        name: readString(row, 'name'),
        owned: readString(row, 'type') === 'LOOKUP' || readOptionalString(row, 'owningConstraint') !== undefined,
      })
    }
    return indexes
  }

  async getConstraints(): Promise<SchemaDescriptor[]> {
    const rows = await this.fetchAll('SHOW CONSTRAINTS YIELD name, type, entityType, labelsOrTypes, properties')
    const constraints: SchemaDescriptor[] = []
    for (const row of rows) {
      if (readString(row, 'entityType') !== 'NODE') continue
      const type = readString(row, 'type')
      const kind = UNIQUE_TYPES.has(type) ? 'unique' : EXISTS_TYPES.has(type) ? 'exists' : undefined
      if (!kind) continue
      const [label = ''] = readStrings(row, 'labelsOrTypes')
      constraints.push({ kind, label, properties: readStrings(row, 'properties'), name: readString(row, 'name') })
    }
    return constraints
  }

  /**
   * @throws UsageError for a label index, which Neo4j does not support
   */
  async createIndex(descriptor: SchemaDescriptor): Promise<void> {
    if (descriptor.properties.length === 0) {
      throw new UsageError(`Neo4j has no label index; index a property of :${descriptor.label} instead`)
    }
    const properties = descriptor.properties.map((property) => `n.${escapeName(property)}`).join(', ')
    await this.execute(
      `CREATE INDEX ${nameOf(descriptor)} IF NOT EXISTS FOR (n${toCypherLabels(descriptor.label)}) ON (${properties})`,
    )
  }

  async dropIndex(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`DROP INDEX ${nameOf(descriptor)} IF EXISTS`)
  }

  async createConstraint(descriptor: SchemaDescriptor): Promise<void> {
    const requirement = descriptor.kind === 'unique' ? 'IS UNIQUE' : 'IS NOT NULL'
    await this.execute(
      `CREATE CONSTRAINT ${nameOf(descriptor)} IF NOT EXISTS FOR (n${toCypherLabels(descriptor.label)}) ` +
        `REQUIRE ${propertyTuple(descriptor.properties)} ${requirement}`,
    )
  }

  async dropConstraint(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`DROP CONSTRAINT ${nameOf(descriptor)} IF EXISTS`)
  }
}
