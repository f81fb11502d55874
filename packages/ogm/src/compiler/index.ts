/**
 * Compiler Module
 *
 * Transforms clause lists into query text.
 */

// Provider interface
export type { QueryCompilerProvider, QueryCompilerFactory } from './provider'

// Cypher compiler (default)
export { CypherCompiler, createCypherCompiler, joinFragments } from './cypher'
