/**
 * Query Compiler Provider Interface
 *
 * Abstraction over the text a clause list compiles to. Both vendors speak
 * openCypher, so the Cypher compiler serves both; a vendor with its own
 * rendering plugs in here.
 */

import type { Clause } from '../ast'

// =============================================================================
// COMPILER PROVIDER INTERFACE
// =============================================================================

/**
 * Interface for compiling a clause list to query text.
 */
export interface QueryCompilerProvider {
  /** Unique name for this compiler (e.g., 'cypher') */
  readonly name: string

  /**
   * Compile clauses into query text.
   */
  compile(clauses: readonly Clause[]): string
}

/**
 * Factory function type for creating compiler instances.
 */
export type QueryCompilerFactory = () => QueryCompilerProvider
