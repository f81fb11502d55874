/**
 * Query Validation
 *
 * Tracks which variables a query has declared so far and checks every clause
 * against them as it is appended, before anything reaches the database.
 */

import type { Clause } from '../ast'
import { isModifierClause, isPatternClause, isProjectionClause } from '../ast'
import {
  ClauseOrderError,
  InvalidMatchChainError,
  NoVariablesMatchedError,
  UndeclaredVariableError,
} from '../errors'

// =============================================================================
// ROOT VARIABLES
// =============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/
const PROPERTY_ACCESS = /^([A-Za-z_][A-Za-z0-9_]*)\s*\./
const LABEL_TEST = /^([A-Za-z_][A-Za-z0-9_]*):/
const FUNCTION_CALL = /^[A-Za-z_][A-Za-z0-9_.]*\s*\(\s*([A-Za-z_][A-Za-z0-9_]*)\s*[.)]/

const KEYWORDS = new Set(['null', 'true', 'false'])

/**
 * The variable an item is rooted at: `n`, `n.name`, `n:Label`, `id(n)`.
 * Anything else (literals, parameters, `count(*)`) has no root and is not
 * checked.
 */
export function rootVariable(item: string): string | undefined {
  const text = item.trim()
  const root =
    (IDENTIFIER.test(text) ? text : undefined) ??
    PROPERTY_ACCESS.exec(text)?.[1] ??
    LABEL_TEST.exec(text)?.[1] ??
    FUNCTION_CALL.exec(text)?.[1]
  if (root === undefined || KEYWORDS.has(root.toLowerCase())) return undefined
  return root
}

// =============================================================================
// SCOPE VALIDATOR
// =============================================================================

const PROJECTIONS = ['RETURN', 'WITH', 'YIELD', 'ORDER BY', 'SKIP', 'LIMIT']

/**
 * Variable scope of a query under construction.
 *
 * After a raw fragment or `YIELD *` the scope is opaque: the builder no
 * longer knows which variables exist and stops checking.
 */
export class ScopeValidator {
  private readonly declared = new Set<string>()
  private opaque = false

  get variables(): string[] {
    return [...this.declared]
  }

  get isOpaque(): boolean {
    return this.opaque
  }

  declare(...names: Array<string | undefined>): void {
    for (const name of names) {
      if (name) this.declared.add(name)
    }
  }

  /** Replace the scope, as WITH does */
  replace(names: string[]): void {
    this.declared.clear()
    this.declare(...names)
  }

  /** Start an empty scope, as UNION does */
  reset(): void {
    this.declared.clear()
    this.opaque = false
  }

  markOpaque(): void {
    this.opaque = true
  }

  /**
   * Fail when `item` is rooted at a variable that is not in scope.
   */
  checkItem(item: string, clause: string): void {
    if (this.opaque) return
    const root = rootVariable(item)
    if (root !== undefined && !this.declared.has(root)) {
      throw new UndeclaredVariableError(root, clause, this.variables)
    }
  }

  /** `RETURN *` / `WITH *` need something to project */
  checkProjectAll(clause: string): void {
    if (!this.opaque && this.declared.size === 0) {
      throw new NoVariablesMatchedError(clause)
    }
  }
}

// =============================================================================
// CHAIN RULES
// =============================================================================

/**
 * A node cannot directly follow another node.
 */
export function checkNodePosition(previous: Clause | undefined): void {
  if (previous?.type === 'node') {
    throw new InvalidMatchChainError(undefined, 'node')
  }
}

/**
 * A relationship must directly follow a node.
 */
export function checkRelationshipPosition(previous: Clause | undefined): void {
  if (previous?.type !== 'node') {
    throw new InvalidMatchChainError(undefined, 'relationship')
  }
}

/**
 * WHERE needs a pattern or a scope to filter.
 */
export function checkWherePosition(clauses: readonly Clause[], scope: ScopeValidator): void {
  if (scope.isOpaque || scope.variables.length > 0) return
  if (!clauses.some(isPatternClause)) {
    throw new InvalidMatchChainError(undefined, 'WHERE')
  }
}

/**
 * ORDER BY, SKIP and LIMIT only follow a projection or another modifier.
 */
export function checkModifierPosition(previous: Clause | undefined, clause: string): void {
  if (previous && (isProjectionClause(previous) || isModifierClause(previous) || previous.type === 'raw')) {
    return
  }
  throw new ClauseOrderError(clause, PROJECTIONS)
}
