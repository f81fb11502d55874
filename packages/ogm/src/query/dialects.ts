/**
 * Vendor Dialects
 *
 * Query builders carrying the clauses only one database understands.
 */

import { UsageError } from '../errors'
import { QueryBuilder } from './builder'

/**
 * Memgraph builder: adds `LOAD CSV`.
 */
export class MemgraphQueryBuilder extends QueryBuilder {
  /**
   * Read a CSV file row by row into `row`.
   *
   * @example
   * ```typescript
   * new MemgraphQueryBuilder().loadCsv('/data/people.csv', true, 'row').return().compile()
   * // " LOAD CSV FROM '/data/people.csv' WITH HEADER AS row RETURN * "
   * ```
   */
  loadCsv(path: string, header: boolean, row: string): this {
    if (!row) {
      throw new UsageError('LOAD CSV needs a row variable', 'LOAD CSV')
    }
    this.append({ type: 'loadCsv', path, header, row })
    this.scope.declare(row)
    return this
  }
}

/**
 * Neo4j builder. The shared clause set covers it.
 */
export class Neo4jQueryBuilder extends QueryBuilder {}
