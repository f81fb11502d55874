/**
 * Executor Module
 *
 * Database clients for Memgraph and Neo4j over the Bolt driver.
 */

// Client interface
export type {
  DatabaseClient,
  Persistable,
  SchemaClient,
  PropertyStore,
  ResultRow,
  QueryParameters,
  Vendor,
} from './provider'

// Bolt transport
export { ConnectionManager } from './connection'
export type { BoltConnection } from './connection'
export { BoltDatabaseClient } from './client'
export type { ClientOptions } from './client'

// Vendor clients
export { MemgraphClient, TRIGGER_EVENTS, TRIGGER_PHASES, readTrigger, triggerStatement } from './memgraph'
export type { MemgraphClientOptions, Procedure, Trigger, TriggerEvent, TriggerObject, TriggerPhase } from './memgraph'
export { Neo4jClient, schemaObjectName } from './neo4j'
export type { Neo4jClientOptions } from './neo4j'
