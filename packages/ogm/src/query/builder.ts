/**
 * Query Builder
 *
 * Fluent builder that appends one clause per call. Chain rules and variable
 * scope are checked as each clause is appended, so an invalid chain fails
 * at the call that breaks it.
 */

import {
  ORDER_DIRECTIONS,
  isOperator,
  isOrderDirection,
  type Clause,
  type Hops,
  type Operand,
  type Operator,
  type OrderDirection,
  type OrderEntry,
  type ProjectionEntry,
  type WhereKeyword,
} from '../ast'
import { CypherCompiler, type QueryCompilerProvider } from '../compiler'
import { UsageError } from '../errors'
import type { DatabaseClient, QueryParameters, ResultRow } from '../executor/provider'
import { toCypherProcedureArguments, type ProcedureArgument } from '../serializer'
import {
  ScopeValidator,
  checkModifierPosition,
  checkNodePosition,
  checkRelationshipPosition,
  checkWherePosition,
} from './validation'

// =============================================================================
// OPTIONS
// =============================================================================

export interface NodeOptions {
  variable?: string
  labels?: string | readonly string[]
  properties?: Record<string, unknown>
}

export interface RelationshipOptions {
  variable?: string
  relationshipType?: string
  properties?: Record<string, unknown>
  /** Variable-length bounds; `{}` matches any length */
  hops?: Hops
  /** Undirected when false (default true) */
  directed?: boolean
}

/**
 * Right-hand side of a condition: exactly one of a value to serialize or
 * expression text.
 */
export interface ConditionValue {
  literal?: unknown
  expression?: string
}

/** An expression with an optional alias */
export type ProjectionItem = string | readonly [expression: string, alias: string]

/**
 * `'n'`, `['n', ['m.name', 'name']]` or `{ 'm.name': 'name' }`.
 */
export type ProjectionInput = string | readonly ProjectionItem[] | Readonly<Record<string, string>>

export type OrderItem = string | readonly [expression: string, direction: OrderDirection]

export type OrderInput = OrderItem | readonly OrderItem[]

/** Operator, checked when the clause is appended */
export type OperatorInput = Operator | (string & {})

export type ForeachUpdates = string | QueryBuilder | ReadonlyArray<string | QueryBuilder>

// =============================================================================
// HELPERS
// =============================================================================

function toOperand(value: ConditionValue, clause: string): Operand {
  const hasLiteral = value.literal !== undefined
  const hasExpression = value.expression !== undefined
  if (hasLiteral === hasExpression) {
    throw new UsageError(`${clause} takes exactly one of literal or expression`, clause)
  }
  return value.expression !== undefined
    ? { kind: 'expression', text: value.expression }
    : { kind: 'literal', value: value.literal }
}

function toOperator(operator: string, clause: string): Operator {
  if (!isOperator(operator)) {
    throw new UsageError(`Unknown operator '${operator}' in ${clause}`, clause)
  }
  return operator
}

function toProjection(input: ProjectionInput, clause: string): ProjectionEntry[] {
  if (typeof input === 'string') {
    return [{ expression: input }]
  }
  if (Array.isArray(input)) {
    return input.map((item: ProjectionItem) => {
      if (typeof item === 'string') return { expression: item }
      const [expression, alias] = item
      return { expression, alias }
    })
  }
  const entries = Object.entries(input)
  if (entries.length === 0) {
    throw new UsageError(`${clause} needs at least one projection`, clause)
  }
  return entries.map(([expression, alias]) => ({ expression, alias }))
}

function isOrderTuple(value: unknown): value is readonly [string, OrderDirection] {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string' &&
    isOrderDirection(value[1])
  )
}

function toOrderEntry(item: OrderItem): OrderEntry {
  if (typeof item === 'string') return { expression: item }
  const [expression, direction] = item
  if (!isOrderDirection(direction)) {
    throw new UsageError(
      `Order direction must be one of ${ORDER_DIRECTIONS.join(', ')}, got '${String(direction)}'`,
      'ORDER BY',
    )
  }
  return { expression, direction }
}

function toOrder(input: OrderInput): OrderEntry[] {
  if (typeof input === 'string' || isOrderTuple(input)) {
    return [toOrderEntry(input)]
  }
  return input.map((item: OrderItem) => toOrderEntry(item))
}

function toList(items: string | readonly string[]): string[] {
  return typeof items === 'string' ? [items] : [...items]
}

// =============================================================================
// QUERY BUILDER
// =============================================================================

/**
 * Builds a Cypher query clause by clause.
 *
 * @example
 * ```typescript
 * match().node({ labels: 'Person', variable: 'p' }).return().compile()
 * // ' MATCH (p:Person) RETURN * '
 *
 * await query(db)
 *   .match()
 *   .node({ labels: 'User', variable: 'u' })
 *   .where('u.age', '>', { literal: 18 })
 *   .return(['u'])
 *   .execute()
 * ```
 */
export class QueryBuilder {
  protected readonly clauses: Clause[] = []
  protected readonly scope = new ScopeValidator()
  private executed = false

  constructor(
    protected readonly client?: DatabaseClient,
    protected readonly compiler: QueryCompilerProvider = new CypherCompiler(),
  ) {}

  /** Clauses appended so far */
  get clauseList(): readonly Clause[] {
    return this.clauses
  }

  /** Variables currently in scope */
  get variables(): string[] {
    return this.scope.variables
  }

  // ===========================================================================
  // READING AND WRITING CLAUSES
  // ===========================================================================

  match(): this {
    return this.append({ type: 'match', optional: false })
  }

  optionalMatch(): this {
    return this.append({ type: 'match', optional: true })
  }

  merge(): this {
    return this.append({ type: 'merge' })
  }

  create(): this {
    return this.append({ type: 'create' })
  }

  /**
   * Call a procedure. A string argument is written as-is; in a list, string
   * arguments are quoted.
   */
  call(procedure: string, args?: ProcedureArgument | ProcedureArgument[]): this {
    return this.append({ type: 'call', procedure, arguments: toCypherProcedureArguments(args) })
  }

  unwind(expression: string, variable: string): this {
    this.append({ type: 'unwind', expression, variable })
    this.scope.declare(variable)
    return this
  }

  // ===========================================================================
  // PATTERNS
  // ===========================================================================

  node(options: NodeOptions = {}): this {
    checkNodePosition(this.last())
    const labels = options.labels === undefined ? [] : toList(options.labels)
    this.append({
      type: 'node',
      variable: options.variable,
      labels,
      properties: options.properties,
    })
    this.scope.declare(options.variable)
    return this
  }

  /** Outgoing relationship `-[...]->`, or undirected `-[...]-` */
  to(options: RelationshipOptions = {}): this {
    return this.relationship(options.directed === false ? 'none' : 'out', options)
  }

  /** Incoming relationship `<-[...]-`, or undirected `-[...]-` */
  from(options: RelationshipOptions = {}): this {
    return this.relationship(options.directed === false ? 'none' : 'in', options)
  }

  // ===========================================================================
  // FILTERING
  // ===========================================================================

  where(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('WHERE', false, item, operator, value)
  }

  whereNot(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('WHERE', true, item, operator, value)
  }

  andWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('AND', false, item, operator, value)
  }

  andNotWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('AND', true, item, operator, value)
  }

  orWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('OR', false, item, operator, value)
  }

  orNotWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('OR', true, item, operator, value)
  }

  xorWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('XOR', false, item, operator, value)
  }

  xorNotWhere(item: string, operator: OperatorInput, value: ConditionValue): this {
    return this.condition('XOR', true, item, operator, value)
  }

  // ===========================================================================
  // PROJECTION
  // ===========================================================================

  /**
   * `WITH *` without arguments; otherwise the projected names become the
   * whole scope.
   */
  with(results?: ProjectionInput): this {
    if (results === undefined) {
      this.scope.checkProjectAll('WITH')
      return this.append({ type: 'with', items: [] })
    }
    const items = this.checkProjection(results, 'WITH')
    this.append({ type: 'with', items })
    if (!this.scope.isOpaque) {
      this.scope.replace(items.map((item) => item.alias || item.expression))
    }
    return this
  }

  return(results?: ProjectionInput): this {
    if (results === undefined) {
      this.scope.checkProjectAll('RETURN')
      return this.append({ type: 'return', items: [] })
    }
    const items = this.checkProjection(results, 'RETURN')
    this.append({ type: 'return', items })
    this.scope.declare(...items.map((item) => item.alias))
    return this
  }

  /**
   * Procedure outputs. `YIELD *` leaves the scope unknown.
   */
  yield(results?: ProjectionInput): this {
    if (results === undefined) {
      this.append({ type: 'yield', items: [] })
      this.scope.markOpaque()
      return this
    }
    const items = toProjection(results, 'YIELD')
    this.append({ type: 'yield', items })
    this.scope.declare(...items.map((item) => item.alias || item.expression))
    return this
  }

  /** Combine with the next query; the next query starts with an empty scope */
  union(all = false): this {
    this.append({ type: 'union', all })
    this.scope.reset()
    return this
  }

  orderBy(properties: OrderInput): this {
    checkModifierPosition(this.last(), 'ORDER BY')
    const items = toOrder(properties)
    for (const item of items) this.scope.checkItem(item.expression, 'ORDER BY')
    return this.append({ type: 'orderBy', items })
  }

  limit(count: number | string): this {
    checkModifierPosition(this.last(), 'LIMIT')
    return this.append({ type: 'limit', count: String(count) })
  }

  skip(count: number | string): this {
    checkModifierPosition(this.last(), 'SKIP')
    return this.append({ type: 'skip', count: String(count) })
  }

  // ===========================================================================
  // UPDATING
  // ===========================================================================

  delete(items: string | readonly string[], options: { detach?: boolean } = {}): this {
    const list = toList(items)
    for (const item of list) this.scope.checkItem(item, 'DELETE')
    return this.append({ type: 'delete', items: list, detach: options.detach ?? false })
  }

  remove(items: string | readonly string[]): this {
    const list = toList(items)
    for (const item of list) this.scope.checkItem(item, 'REMOVE')
    return this.append({ type: 'remove', items: list })
  }

  /**
   * `SET n.p = 1`, `SET n += {...}`, or `SET n:Label` with the `:` operator.
   */
  set(item: string, operator: OperatorInput, value: ConditionValue): this {
    const checked = toOperator(operator, 'SET')
    const operand = toOperand(value, 'SET')
    this.scope.checkItem(item, 'SET')
    return this.append({ type: 'set', item, operator: checked, operand })
  }

  /**
   * Run update clauses for every element of a list. Builders passed as
   * updates are compiled in place.
   *
   * @example
   * ```typescript
   * foreach('i', '[1, 2, 3]', create().node({ variable: 'n', properties: { id: new PropertyVariable('i') } }))
   * // ' FOREACH ( i IN [1, 2, 3] | CREATE (n {id: i}) ) '
   * ```
   */
  foreach(variable: string, expression: string, updates: ForeachUpdates): this {
    const list = typeof updates === 'string' || updates instanceof QueryBuilder ? [updates] : [...updates]
    if (list.length === 0) {
      throw new UsageError('FOREACH needs at least one update clause', 'FOREACH')
    }
    const rendered = list.map((update) => (typeof update === 'string' ? update : update.compile()).trim())
    return this.append({ type: 'foreach', variable, expression, updates: rendered })
  }

  /**
   * Append query text as-is. Variable checks stop from here on.
   */
  raw(text: string): this {
    this.append({ type: 'raw', text })
    this.scope.markOpaque()
    return this
  }

  // ===========================================================================
  // TERMINALS
  // ===========================================================================

  compile(): string {
    return this.compiler.compile(this.clauses)
  }

  /** Run the query for its side effects */
  async execute(parameters: QueryParameters = {}): Promise<void> {
    const client = this.requireClient()
    const query = this.compile()
    this.executed = true
    await client.execute(query, parameters)
  }

  /**
   * Stream result rows. Every call runs the query again.
   */
  async *executeAndFetch(parameters: QueryParameters = {}): AsyncGenerator<ResultRow, void, undefined> {
    const client = this.requireClient()
    const query = this.compile()
    this.executed = true
    yield* client.executeAndFetch(query, parameters)
  }

  /**
   * Value of `variable` (default: the first column) in the first row, or
   * undefined when there are no rows.
   */
  async getSingle(variable?: string, parameters: QueryParameters = {}): Promise<unknown> {
    for await (const row of this.executeAndFetch(parameters)) {
      if (variable !== undefined) return row[variable]
      return Object.values(row)[0]
    }
    return undefined
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  protected append(clause: Clause): this {
    if (this.executed) {
      throw new UsageError('Cannot append clauses to a query that has been executed')
    }
    this.clauses.push(clause)
    return this
  }

  protected last(): Clause | undefined {
    return this.clauses[this.clauses.length - 1]
  }

  private relationship(direction: 'out' | 'in' | 'none', options: RelationshipOptions): this {
    checkRelationshipPosition(this.last())
    this.append({
      type: 'relationship',
      direction,
      variable: options.variable,
      relationshipType: options.relationshipType,
      properties: options.properties,
      hops: options.hops,
    })
    this.scope.declare(options.variable)
    return this
  }

  private condition(
    keyword: WhereKeyword,
    negated: boolean,
    item: string,
    operator: OperatorInput,
    value: ConditionValue,
  ): this {
    const clause = negated ? `${keyword} NOT` : keyword
    checkWherePosition(this.clauses, this.scope)
    const checked = toOperator(operator, clause)
    const operand = toOperand(value, clause)
    this.scope.checkItem(item, clause)
    return this.append({ type: 'where', keyword, negated, item, operator: checked, operand })
  }

  private checkProjection(results: ProjectionInput, clause: string): ProjectionEntry[] {
    const items = toProjection(results, clause)
    for (const item of items) this.scope.checkItem(item.expression, clause)
    return items
  }

  private requireClient(): DatabaseClient {
    if (!this.client) {
      throw new UsageError('Query has no database client to run on; build it with query(client)')
    }
    return this.client
  }
}

