/**
 * Clause Model
 *
 * A query is an ordered list of clauses. Each clause is a plain value tagged
 * by `type`; the compiler turns the list into Cypher text.
 */

// =============================================================================
// OPERATORS
// =============================================================================

export const OPERATORS = [
  '=',
  '<>',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  'IN',
  'STARTS WITH',
  'ENDS WITH',
  'CONTAINS',
  '=~',
  ':',
  '+=',
] as const

/**
 * Comparison, membership, string and assignment operators.
 * `:` is the label filter (`n:User`), `+=` merges a map into a variable.
 */
export type Operator = (typeof OPERATORS)[number]

export function isOperator(value: string): value is Operator {
  return (OPERATORS as readonly string[]).includes(value)
}

export const ORDER_DIRECTIONS = ['ASC', 'ASCENDING', 'DESC', 'DESCENDING'] as const

export type OrderDirection = (typeof ORDER_DIRECTIONS)[number]

export function isOrderDirection(value: string): value is OrderDirection {
  return (ORDER_DIRECTIONS as readonly string[]).includes(value)
}

export type WhereKeyword = 'WHERE' | 'AND' | 'OR' | 'XOR'

export type Direction = 'out' | 'in' | 'none'

// =============================================================================
// OPERANDS AND PROJECTIONS
// =============================================================================

/**
 * Right-hand side of a WHERE or SET item: a value serialized to a literal,
 * or expression text written as-is.
 */
export type Operand =
  | { kind: 'literal'; value: unknown }
  | { kind: 'expression'; text: string }

export interface ProjectionEntry {
  expression: string
  alias?: string
}

export interface OrderEntry {
  expression: string
  direction?: OrderDirection
}

/**
 * Variable-length relationship bounds, `*min..max`.
 */
export interface Hops {
  min?: number
  max?: number
}

// =============================================================================
// CLAUSES
// =============================================================================

export interface MatchClause {
  type: 'match'
  optional: boolean
}

export interface MergeClause {
  type: 'merge'
}

export interface CreateClause {
  type: 'create'
}

export interface CallClause {
  type: 'call'
  procedure: string
  /** Argument text, already rendered */
  arguments: string
}

export interface NodeClause {
  type: 'node'
  variable?: string
  labels: string[]
  properties?: Record<string, unknown>
}

export interface RelationshipClause {
  type: 'relationship'
  direction: Direction
  variable?: string
  relationshipType?: string
  properties?: Record<string, unknown>
  hops?: Hops
}

export interface WhereClause {
  type: 'where'
  keyword: WhereKeyword
  negated: boolean
  item: string
  operator: Operator
  operand: Operand
}

export interface UnwindClause {
  type: 'unwind'
  expression: string
  variable: string
}

export interface WithClause {
  type: 'with'
  /** Empty means `*` */
  items: ProjectionEntry[]
}

export interface ReturnClause {
  type: 'return'
  items: ProjectionEntry[]
}

export interface YieldClause {
  type: 'yield'
  items: ProjectionEntry[]
}

export interface UnionClause {
  type: 'union'
  all: boolean
}

export interface DeleteClause {
  type: 'delete'
  items: string[]
  detach: boolean
}

export interface RemoveClause {
  type: 'remove'
  items: string[]
}

export interface OrderByClause {
  type: 'orderBy'
  items: OrderEntry[]
}

export interface LimitClause {
  type: 'limit'
  count: string
}

export interface SkipClause {
  type: 'skip'
  count: string
}

export interface ForeachClause {
  type: 'foreach'
  variable: string
  expression: string
  /** Update clauses, already rendered */
  updates: string[]
}

export interface SetClause {
  type: 'set'
  item: string
  operator: Operator
  operand: Operand
}

export interface LoadCsvClause {
  type: 'loadCsv'
  path: string
  header: boolean
  row: string
}

export interface RawClause {
  type: 'raw'
  text: string
}

export type Clause =
  | MatchClause
  | MergeClause
  | CreateClause
  | CallClause
  | NodeClause
  | RelationshipClause
  | WhereClause
  | UnwindClause
  | WithClause
  | ReturnClause
  | YieldClause
  | UnionClause
  | DeleteClause
  | RemoveClause
  | OrderByClause
  | LimitClause
  | SkipClause
  | ForeachClause
  | SetClause
  | LoadCsvClause
  | RawClause

export type ClauseType = Clause['type']

/** Clauses that project a result and open a new scope. */
export type ProjectionClause = WithClause | ReturnClause | YieldClause

export function isProjectionClause(clause: Clause): clause is ProjectionClause {
  return clause.type === 'with' || clause.type === 'return' || clause.type === 'yield'
}

/** Clauses that may only follow a projection or another modifier. */
export type ModifierClause = OrderByClause | LimitClause | SkipClause

export function isModifierClause(clause: Clause): clause is ModifierClause {
  return clause.type === 'orderBy' || clause.type === 'limit' || clause.type === 'skip'
}

export function isPatternClause(clause: Clause): clause is NodeClause | RelationshipClause {
  return clause.type === 'node' || clause.type === 'relationship'
}
