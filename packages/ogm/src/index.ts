/**
 * Cypher OGM - Object Graph Mapper and Query Builder for Memgraph and Neo4j
 *
 * Declare node and relationship models with zod fields, build openCypher
 * queries fluently, and get model instances back from results.
 *
 * @example
 * ```typescript
 * import { field, node, relationship, match, MemgraphClient, ModelRegistry } from 'cypher-ogm'
 * import { z } from 'zod'
 *
 * const User = node({
 *   name: 'User',
 *   fields: {
 *     id: field(z.string()).unique(),
 *     name: field(z.string()).index(),
 *   },
 * })
 * const Follows = relationship({ name: 'Follows', type: 'FOLLOWS' })
 *
 * const registry = new ModelRegistry().register(User, Follows)
 * const db = new MemgraphClient({ registry })
 * await registry.syncSchema(db)
 *
 * // MODELS
 * const alice = await User.create({ id: 'u1', name: 'Alice' }).save(db)
 * const [bob, created] = await User.create({ id: 'u2' }).getOrCreate(db)
 * await Follows.create(alice, bob).save(db)
 *
 * // QUERIES
 * for await (const row of match(db)
 *   .node({ labels: 'User', variable: 'u' })
 *   .where('u.name', '=', { literal: 'Alice' })
 *   .return(['u'])
 *   .executeAndFetch()) {
 *   console.log(row.u) // a ModelNode of User
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SERIALIZER
// =============================================================================

export {
  serialize,
  escapeName,
  toCypherLabels,
  toCypherProperties,
  toCypherProcedureArguments,
  PropertyVariable,
  TemporalValue,
  fromDriverTemporal,
  fromDriverInteger,
} from './serializer'
export type {
  QuoteStyle,
  SerializeOptions,
  ProcedureArgument,
  TemporalKind,
  DurationComponents,
} from './serializer'

// =============================================================================
// CLAUSE MODEL AND COMPILER
// =============================================================================

export { OPERATORS, ORDER_DIRECTIONS, isOperator, isOrderDirection } from './ast'
export type { Clause, ClauseType, Operator, OrderDirection, Direction, Hops } from './ast'

export { CypherCompiler, createCypherCompiler, joinFragments } from './compiler'
export type { QueryCompilerProvider, QueryCompilerFactory } from './compiler'

// =============================================================================
// QUERY BUILDER
// =============================================================================

export {
  query,
  match,
  optionalMatch,
  create,
  merge,
  call,
  unwind,
  foreach,
  loadCsv,
  QueryBuilder,
  MemgraphQueryBuilder,
  Neo4jQueryBuilder,
} from './query'
export type {
  NodeOptions,
  RelationshipOptions,
  ConditionValue,
  ProjectionItem,
  ProjectionInput,
  OrderItem,
  OrderInput,
  OperatorInput,
  ForeachUpdates,
} from './query'

// =============================================================================
// MODELS
// =============================================================================

export {
  field,
  node,
  relationship,
  FieldBuilder,
  ModelRegistry,
  descriptorKey,
  dedupeDescriptors,
  diffDescriptors,
  fieldDescriptors,
  isConstraint,
} from './schema'
export type {
  NodeConfig,
  RelationshipConfig,
  FieldOptions,
  FieldDefinition,
  FieldShape,
  FieldValues,
  DescriptorKind,
  SchemaDescriptor,
  NodeDefinition,
  NodeProps,
  NodeValues,
  TraitProps,
  RelationshipDefinition,
  RelationshipProps,
  ModelDefinition,
  DescriptorDiff,
} from './schema'

export {
  ModelNode,
  ModelRelationship,
  GraphNode,
  GraphRelationship,
  GraphPath,
  deserialize,
  deserializeNode,
  deserializeRelationship,
} from './model'
export type { NodeRef, NodeValue, RelationshipValue } from './model'

// =============================================================================
// CLIENTS
// =============================================================================

export {
  MemgraphClient,
  Neo4jClient,
  BoltDatabaseClient,
  ConnectionManager,
  schemaObjectName,
  triggerStatement,
  readTrigger,
  TRIGGER_EVENTS,
  TRIGGER_PHASES,
} from './executor'
export type {
  DatabaseClient,
  Persistable,
  SchemaClient,
  PropertyStore,
  ResultRow,
  QueryParameters,
  Vendor,
  BoltConnection,
  ClientOptions,
  MemgraphClientOptions,
  Neo4jClientOptions,
  Procedure,
  Trigger,
  TriggerEvent,
  TriggerObject,
  TriggerPhase,
} from './executor'

export { loadConnectionConfig, parseConnectionConfig, boltUri, ConnectionConfigSchema, PoolConfigSchema } from './config'
export type { ConnectionConfig, ConnectionConfigInput } from './config'

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphOgmError,
  SerializationError,
  ValidationError,
  UsageError,
  InvalidMatchChainError,
  NoVariablesMatchedError,
  UndeclaredVariableError,
  ClauseOrderError,
  NotFoundError,
  DatabaseError,
  AmbiguousDispatchError,
} from './errors'

// =============================================================================
// UTILITIES
// =============================================================================

export { createLogger, getLogLevel } from './utils'
export type { Prettify, PropertyMap, Logger, LogLevel } from './utils'
