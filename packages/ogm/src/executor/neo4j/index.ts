/**
 * Neo4j Module
 */

export { Neo4jClient, schemaObjectName } from './client'
export type { Neo4jClientOptions } from './client'
