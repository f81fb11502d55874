/**
 * Query Module
 *
 * Fluent query builder and its entry points.
 */

// Entry points
export { query, match, optionalMatch, create, merge, call, unwind, foreach, loadCsv } from './entry'

// Builders
export { QueryBuilder } from './builder'
export { MemgraphQueryBuilder, Neo4jQueryBuilder } from './dialects'
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
} from './builder'

// Validation
export {
  ScopeValidator,
  rootVariable,
  checkModifierPosition,
  checkNodePosition,
  checkRelationshipPosition,
  checkWherePosition,
} from './validation'
