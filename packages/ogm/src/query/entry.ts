/**
 * Query Entry Points
 *
 * Start a query with its first clause. The client, when given, is the last
 * argument and is what terminal calls run on; without one the query can
 * only be compiled.
 */

import type { DatabaseClient } from '../executor/provider'
import type { ProcedureArgument } from '../serializer'
import { QueryBuilder, type ForeachUpdates } from './builder'
import { MemgraphQueryBuilder } from './dialects'

function builder(client?: DatabaseClient): QueryBuilder {
  return client ? client.newQuery() : new QueryBuilder()
}

/** An empty query */
export function query(client?: DatabaseClient): QueryBuilder {
  return builder(client)
}

export function match(client?: DatabaseClient): QueryBuilder {
  return builder(client).match()
}

export function optionalMatch(client?: DatabaseClient): QueryBuilder {
  return builder(client).optionalMatch()
}

export function create(client?: DatabaseClient): QueryBuilder {
  return builder(client).create()
}

export function merge(client?: DatabaseClient): QueryBuilder {
  return builder(client).merge()
}

export function call(
  procedure: string,
  args?: ProcedureArgument | ProcedureArgument[],
  client?: DatabaseClient,
): QueryBuilder {
  return builder(client).call(procedure, args)
}

export function unwind(expression: string, variable: string, client?: DatabaseClient): QueryBuilder {
  return builder(client).unwind(expression, variable)
}

export function foreach(
  variable: string,
  expression: string,
  updates: ForeachUpdates,
  client?: DatabaseClient,
): QueryBuilder {
  return builder(client).foreach(variable, expression, updates)
}

/**
 * Start a Memgraph query with `LOAD CSV`.
 */
export function loadCsv(path: string, header: boolean, row: string, client?: DatabaseClient): MemgraphQueryBuilder {
  return new MemgraphQueryBuilder(client).loadCsv(path, header, row)
}
