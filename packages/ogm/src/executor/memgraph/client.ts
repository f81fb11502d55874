/**
 * Memgraph Client
 */

import { loadConnectionConfig, parseConnectionConfig, type ConnectionConfigInput } from '../../config'
import { MemgraphQueryBuilder } from '../../query/dialects'
import type { SchemaDescriptor } from '../../schema'
import { escapeName, toCypherLabels } from '../../serializer'
import { BoltDatabaseClient, type ClientOptions } from '../client'
import { ConnectionManager, type BoltConnection } from '../connection'
import { readBoolean, readString, readStrings } from '../schema-rows'
import { readTrigger, triggerStatement, type Trigger } from './triggers'

export interface MemgraphClientOptions extends ClientOptions {
  /** Connection settings; read from `MEMGRAPH_*` variables when omitted */
  config?: ConnectionConfigInput
  /** Use an existing connection instead of opening one */
  connection?: BoltConnection
}

/**
 * A procedure of a loaded query module, as listed by `mg.procedures()`.
 */
export interface Procedure {
  name: string
  signature: string
  isEditable: boolean
  isWrite: boolean
  path: string
}

function propertyList(variable: string, properties: readonly string[]): string {
  return properties.map((property) => `${variable}.${escapeName(property)}`).join(', ')
}

function indexTarget(descriptor: SchemaDescriptor): string {
  const labels = toCypherLabels(descriptor.label)
  if (descriptor.properties.length === 0) return labels
  return `${labels}(${descriptor.properties.map(escapeName).join(', ')})`
}

function constraintBody(descriptor: SchemaDescriptor): string {
  const pattern = `(n${toCypherLabels(descriptor.label)})`
  if (descriptor.kind === 'unique') {
    return `${pattern} ASSERT ${propertyList('n', descriptor.properties)} IS UNIQUE`
  }
  return `${pattern} ASSERT EXISTS (${propertyList('n', descriptor.properties)})`
}

/**
 * Client for Memgraph.
 *
 * @example
 * ```typescript
 * const db = new MemgraphClient({ config: { host: 'localhost' }, registry })
 * await registry.syncSchema(db)
 * await match(db).node({ labels: 'User', variable: 'u' }).return().execute()
 * ```
 */
export class MemgraphClient extends BoltDatabaseClient {
  readonly vendor = 'memgraph' as const

  constructor(options: MemgraphClientOptions = {}) {
    super(
      options.connection ??
        new ConnectionManager(
          options.config ? parseConnectionConfig(options.config) : loadConnectionConfig('memgraph'),
        ),
      options,
    )
  }

  newQuery(): MemgraphQueryBuilder {
    return new MemgraphQueryBuilder(this)
  }

  async getIndexes(): Promise<SchemaDescriptor[]> {
    const rows = await this.fetchAll('SHOW INDEX INFO;')
    return rows.map((row): SchemaDescriptor => ({
      kind: 'index',
      label: readString(row, 'label'),
      properties: readStrings(row, 'property'),
    }))
  }

  async getConstraints(): Promise<SchemaDescriptor[]> {
    const rows = await this.fetchAll('SHOW CONSTRAINT INFO;')
    const constraints: SchemaDescriptor[] = []
    for (const row of rows) {
      const type = readString(row, 'constraint type')
      if (type !== 'unique' && type !== 'exists') continue
      constraints.push({ kind: type, label: readString(row, 'label'), properties: readStrings(row, 'properties') })
    }
    return constraints
  }

  async createIndex(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`CREATE INDEX ON ${indexTarget(descriptor)};`)
  }

  async dropIndex(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`DROP INDEX ON ${indexTarget(descriptor)};`)
  }

  async createConstraint(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`CREATE CONSTRAINT ON ${constraintBody(descriptor)};`)
  }

  async dropConstraint(descriptor: SchemaDescriptor): Promise<void> {
    await this.execute(`DROP CONSTRAINT ON ${constraintBody(descriptor)};`)
  }

  // ===========================================================================
  // TRIGGERS
  // ===========================================================================

  async createTrigger(trigger: Trigger): Promise<void> {
    await this.execute(triggerStatement(trigger))
  }

  async getTriggers(): Promise<Trigger[]> {
    const rows = await this.fetchAll('SHOW TRIGGERS;')
    return rows.map(readTrigger)
  }

  async dropTrigger(trigger: Trigger | string): Promise<void> {
    const name = typeof trigger === 'string' ? trigger : trigger.name
    await this.execute(`DROP TRIGGER ${escapeName(name)};`)
  }

  async dropTriggers(): Promise<void> {
    for (const trigger of await this.getTriggers()) {
      await this.dropTrigger(trigger)
    }
  }

  // ===========================================================================
  // QUERY MODULES
  // ===========================================================================

  /**
   * Procedures of the loaded query modules, optionally only those whose name
   * starts with `prefix`.
   */
  async getProcedures(prefix?: string): Promise<Procedure[]> {
    const rows = await this.fetchAll('CALL mg.procedures() YIELD *;')
    return rows
      .map((row): Procedure => ({
        name: readString(row, 'name'),
        signature: readString(row, 'signature'),
        isEditable: readBoolean(row, 'is_editable'),
        isWrite: readBoolean(row, 'is_write'),
        path: readString(row, 'path'),
      }))
      .filter((procedure) => prefix === undefined || procedure.name.startsWith(prefix))
  }
}
