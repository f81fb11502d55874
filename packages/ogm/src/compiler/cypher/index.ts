/**
 * Cypher Compiler Module
 *
 * Exports the Cypher query compiler for Memgraph and Neo4j.
 */

export { CypherCompiler, createCypherCompiler, joinFragments } from './compiler'
