/**
 * Bolt connection stand-in replying with driver records.
 */

import { Record as Neo4jRecord } from 'neo4j-driver'
import type { BoltConnection } from '../../../src'

export type Reply = Array<Record<string, unknown>> | Error

/**
 * Build driver records from plain rows.
 */
export function records(rows: Array<Record<string, unknown>>): Neo4jRecord[] {
  return rows.map((row) => new Neo4jRecord(Object.keys(row), Object.values(row)))
}

export class ScriptedConnection implements BoltConnection {
  readonly queries: string[] = []
  closed = false

  constructor(private readonly reply: (query: string) => Reply = () => []) {}

  async *stream(query: string): AsyncGenerator<Neo4jRecord, void, undefined> {
    this.queries.push(query)
    const reply = this.reply(query)
    if (reply instanceof Error) throw reply
    yield* records(reply)
  }

  async run(query: string): Promise<void> {
    this.queries.push(query)
    const reply = this.reply(query)
    if (reply instanceof Error) throw reply
  }

  async close(): Promise<void> {
    this.closed = true
  }
}
