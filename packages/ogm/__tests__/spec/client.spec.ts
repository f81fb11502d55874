/**
 * Database Client Tests
 *
 * Row handling, error wrapping and schema statements of the Memgraph and
 * Neo4j clients, over a scripted connection.
 */

import { newError } from 'neo4j-driver-core'
import { describe, it, expect } from 'vitest'
import {
  DatabaseError,
  MemgraphClient,
  MemgraphQueryBuilder,
  ModelNode,
  ModelRegistry,
  Neo4jClient,
  Neo4jQueryBuilder,
  UsageError,
  type ResultRow,
} from '../../src'
import { Follows, User, driverNode, driverRelationship } from './fixtures/models'
import { ScriptedConnection } from './fixtures/scripted-connection'

async function drain(rows: AsyncGenerator<ResultRow, void, undefined>): Promise<ResultRow[]> {
  const collected: ResultRow[] = []
  for await (const row of rows) collected.push(row)
  return collected
}

describe('BoltDatabaseClient', () => {
  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  describe('execution', () => {
    it('deserializes every row through the registry', async () => {
      const connection = new ScriptedConnection(() => [{ u: driverNode(1, ['User'], { id: 'u1' }), total: 3 }])
      const db = new MemgraphClient({ connection, registry: new ModelRegistry().register(User) })

      const rows = await drain(db.executeAndFetch('MATCH (u:User) RETURN u, 3 AS total'))

      expect(rows).toHaveLength(1)
      expect(rows[0]?.u).toBeInstanceOf(ModelNode)
      expect(rows[0]?.total).toBe(3)
    })

    it('wraps driver errors, keeping message and code', async () => {
      const failure = newError('Invalid input', 'Neo.ClientError.Statement.SyntaxError')
      const db = new MemgraphClient({ connection: new ScriptedConnection(() => failure) })

      const error: unknown = await db.execute('MATCH (n RETURN n', { id: 1 }).catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(DatabaseError)
      if (error instanceof DatabaseError) {
        expect(error.message).toBe('Invalid input')
        expect(error.code).toBe('Neo.ClientError.Statement.SyntaxError')
        expect(error.cypher).toBe('MATCH (n RETURN n')
        expect(error.params).toEqual({ id: 1 })
        expect(error.cause).toBe(failure)
      }
    })

    it('wraps errors raised while streaming', async () => {
      const db = new Neo4jClient({ connection: new ScriptedConnection(() => new Error('connection reset')) })
      await expect(drain(db.executeAndFetch('RETURN 1'))).rejects.toThrow(DatabaseError)
    })

    it('deletes everything on dropDatabase', async () => {
      const connection = new ScriptedConnection()
      await new MemgraphClient({ connection }).dropDatabase()
      expect(connection.queries).toEqual([' MATCH (n) DETACH DELETE n '])
    })

    it('builds queries in its dialect', () => {
      const connection = new ScriptedConnection()
      expect(new MemgraphClient({ connection }).newQuery()).toBeInstanceOf(MemgraphQueryBuilder)
      expect(new Neo4jClient({ connection }).newQuery()).toBeInstanceOf(Neo4jQueryBuilder)
    })

    it('closes its connection', async () => {
      const connection = new ScriptedConnection()
      await new Neo4jClient({ connection }).close()
      expect(connection.closed).toBe(true)
    })
  })

  // ===========================================================================
  // BULK SAVE
  // ===========================================================================

  describe('bulk save', () => {
    it('saves nodes in order and assigns their ids', async () => {
      let nextId = 1
      const connection = new ScriptedConnection(() => [{ node: driverNode(nextId++, ['User'], {}) }])
      const db = new MemgraphClient({ connection, registry: new ModelRegistry().register(User) })
      const users = [User.create({ id: 'u1' }), User.create({ id: 'u2' })]

      await db.saveNodes(users)

      expect(users.map((user) => user.id)).toEqual([1, 2])
      expect(connection.queries).toEqual([
        ' CREATE (node:User {id: "u1"}) RETURN node ',
        ' CREATE (node:User {id: "u2"}) RETURN node ',
      ])
    })

    it('saves relationships in order and assigns their ids', async () => {
      let nextId = 10
      const connection = new ScriptedConnection(() => [
        { relationship: driverRelationship(nextId++, 1, 2, 'FOLLOWS', {}) },
      ])
      const db = new MemgraphClient({ connection, registry: new ModelRegistry().register(User, Follows) })
      const follows = [Follows.create(1, 2), Follows.create(2, 1)]

      await db.saveRelationships(follows)

      expect(follows.map((relationship) => relationship.id)).toEqual([10, 11])
      expect(connection.queries).toHaveLength(2)
    })
  })

  // ===========================================================================
  // MEMGRAPH TRIGGERS
  // ===========================================================================

  describe('Memgraph triggers', () => {
    it('creates triggers with and without an event', async () => {
      const connection = new ScriptedConnection()
      const db = new MemgraphClient({ connection })

      await db.createTrigger({ name: 'stamp', event: 'CREATE', object: 'node', phase: 'AFTER', statement: 'CREATE (:Node)' })
      await db.createTrigger({ name: 'audit', event: 'UPDATE', phase: 'BEFORE', statement: 'CREATE (:Audit)' })
      await db.createTrigger({ name: 'always', phase: 'BEFORE', statement: 'CREATE (:Node)' })

      expect(connection.queries).toEqual([
        'CREATE TRIGGER stamp ON () CREATE AFTER COMMIT EXECUTE CREATE (:Node);',
        'CREATE TRIGGER audit ON UPDATE BEFORE COMMIT EXECUTE CREATE (:Audit);',
        'CREATE TRIGGER always BEFORE COMMIT EXECUTE CREATE (:Node);',
      ])
    })

    it('needs an event when an object is named', async () => {
      const connection = new ScriptedConnection()
      const db = new MemgraphClient({ connection })

      await expect(
        db.createTrigger({ name: 'bad', object: 'relationship', phase: 'AFTER', statement: 'RETURN 1' }),
      ).rejects.toThrow(UsageError)
      expect(connection.queries).toEqual([])
    })

    it('reads triggers', async () => {
      const connection = new ScriptedConnection(() => [
        { 'trigger name': 'always', 'event type': 'ANY', phase: 'BEFORE COMMIT', statement: 'CREATE (:Node)' },
        { 'trigger name': 'edges', 'event type': '--> UPDATE', phase: 'AFTER COMMIT', statement: 'RETURN 1' },
        { 'trigger name': 'gone', 'event type': 'DELETE', phase: 'AFTER COMMIT', statement: 'RETURN 2' },
      ])

      expect(await new MemgraphClient({ connection }).getTriggers()).toEqual([
        { name: 'always', phase: 'BEFORE', statement: 'CREATE (:Node)' },
        { name: 'edges', event: 'UPDATE', object: 'relationship', phase: 'AFTER', statement: 'RETURN 1' },
        { name: 'gone', event: 'DELETE', phase: 'AFTER', statement: 'RETURN 2' },
      ])
      expect(connection.queries).toEqual(['SHOW TRIGGERS;'])
    })

    it('drops every trigger', async () => {
      const connection = new ScriptedConnection((query) =>
        query === 'SHOW TRIGGERS;'
          ? [
              { 'trigger name': 'a', 'event type': '() CREATE', phase: 'BEFORE COMMIT', statement: 'RETURN 1' },
              { 'trigger name': 'b', 'event type': 'ANY', phase: 'AFTER COMMIT', statement: 'RETURN 2' },
            ]
          : [],
      )

      await new MemgraphClient({ connection }).dropTriggers()

      expect(connection.queries).toEqual(['SHOW TRIGGERS;', 'DROP TRIGGER a;', 'DROP TRIGGER b;'])
    })

    it('lists procedures by prefix', async () => {
      const procedure = (name: string) => ({
        name,
        signature: `${name}() :: (result :: ANY)`,
        is_editable: false,
        is_write: false,
        path: '/usr/lib/memgraph/query_modules/module.so',
      })
      const connection = new ScriptedConnection(() => [procedure('mg.procedures'), procedure('nxalg.pagerank')])

      const procedures = await new MemgraphClient({ connection }).getProcedures('nxalg.')

      expect(procedures).toEqual([
        {
          name: 'nxalg.pagerank',
          signature: 'nxalg.pagerank() :: (result :: ANY)',
          isEditable: false,
          isWrite: false,
          path: '/usr/lib/memgraph/query_modules/module.so',
        },
      ])
      expect(connection.queries).toEqual(['CALL mg.procedures() YIELD *;'])
    })
  })

  // ===========================================================================
  // MEMGRAPH SCHEMA
  // ===========================================================================

  describe('Memgraph schema', () => {
    it('reads label and label-property indexes', async () => {
      const connection = new ScriptedConnection(() => [
        { 'index type': 'label', label: 'User', property: null, count: 2 },
        { 'index type': 'label+property', label: 'User', property: 'name', count: 2 },
      ])
      expect(await new MemgraphClient({ connection }).getIndexes()).toEqual([
        { kind: 'index', label: 'User', properties: [] },
        { kind: 'index', label: 'User', properties: ['name'] },
      ])
      expect(connection.queries).toEqual(['SHOW INDEX INFO;'])
    })

    it('drops obsolete and creates missing indexes', async () => {
      const connection = new ScriptedConnection((query) =>
        query === 'SHOW INDEX INFO;'
          ? [
              { 'index type': 'label+property', label: 'User', property: 'name', count: 0 },
              { 'index type': 'label+property', label: 'Old', property: 'x', count: 0 },
            ]
          : [],
      )

      await new MemgraphClient({ connection }).ensureIndexes([
        { kind: 'index', label: 'User', properties: ['name'] },
        { kind: 'index', label: 'User', properties: [] },
      ])

      expect(connection.queries).toEqual(['SHOW INDEX INFO;', 'DROP INDEX ON :Old(x);', 'CREATE INDEX ON :User;'])
    })

    it('reads and synchronises constraints', async () => {
      const connection = new ScriptedConnection((query) =>
        query === 'SHOW CONSTRAINT INFO;'
          ? [
              { 'constraint type': 'unique', label: 'User', properties: ['id'] },
              { 'constraint type': 'exists', label: 'User', properties: 'name' },
            ]
          : [],
      )

      await new MemgraphClient({ connection }).ensureConstraints([
        { kind: 'unique', label: 'User', properties: ['id'] },
        { kind: 'unique', label: 'Pair', properties: ['a', 'b'] },
      ])

      expect(connection.queries).toEqual([
        'SHOW CONSTRAINT INFO;',
        'DROP CONSTRAINT ON (n:User) ASSERT EXISTS (n.name);',
        'CREATE CONSTRAINT ON (n:Pair) ASSERT n.a, n.b IS UNIQUE;',
      ])
    })
  })

  // ===========================================================================
  // NEO4J SCHEMA
  // ===========================================================================

  describe('Neo4j schema', () => {
    const indexRows = [
      { name: 'index_lookup', type: 'LOOKUP', entityType: 'NODE', labelsOrTypes: null, properties: null, owningConstraint: null },
      { name: 'user_id', type: 'RANGE', entityType: 'NODE', labelsOrTypes: ['User'], properties: ['id'], owningConstraint: 'user_id' },
      { name: 'old_x', type: 'RANGE', entityType: 'NODE', labelsOrTypes: ['Old'], properties: ['x'], owningConstraint: null },
      { name: 'rel_since', type: 'RANGE', entityType: 'RELATIONSHIP', labelsOrTypes: ['FOLLOWS'], properties: ['since'], owningConstraint: null },
    ]

    it('marks lookup and constraint-backed indexes as owned', async () => {
      const connection = new ScriptedConnection(() => indexRows)
      expect(await new Neo4jClient({ connection }).getIndexes()).toEqual([
        { kind: 'index', label: '', properties: [], name: 'index_lookup', owned: true },
        { kind: 'index', label: 'User', properties: ['id'], name: 'user_id', owned: true },
        { kind: 'index', label: 'Old', properties: ['x'], name: 'old_x', owned: false },
      ])
    })

    it('never drops owned indexes', async () => {
      const connection = new ScriptedConnection((query) => (query.startsWith('SHOW INDEXES') ? indexRows : []))

      await new Neo4jClient({ connection }).ensureIndexes([{ kind: 'index', label: 'User', properties: ['name'] }])

      expect(connection.queries.slice(1)).toEqual([
        'DROP INDEX old_x IF EXISTS',
        'CREATE INDEX index_User_name IF NOT EXISTS FOR (n:User) ON (n.name)',
      ])
    })

    it('reads and creates constraints by name', async () => {
      const connection = new ScriptedConnection((query) =>
        query.startsWith('SHOW CONSTRAINTS')
          ? [
              { name: 'user_id', type: 'UNIQUENESS', entityType: 'NODE', labelsOrTypes: ['User'], properties: ['id'] },
              { name: 'user_key', type: 'NODE_KEY', entityType: 'NODE', labelsOrTypes: ['User'], properties: ['k'] },
            ]
          : [],
      )
      const db = new Neo4jClient({ connection })

      expect(await db.getConstraints()).toEqual([{ kind: 'unique', label: 'User', properties: ['id'], name: 'user_id' }])

      await db.ensureConstraints([
        { kind: 'unique', label: 'User', properties: ['id'] },
        { kind: 'exists', label: 'User', properties: ['name'] },
      ])

      expect(connection.queries.slice(2)).toEqual([
        'CREATE CONSTRAINT exists_User_name IF NOT EXISTS FOR (n:User) REQUIRE n.name IS NOT NULL',
      ])
    })

    it('drops constraints by name', async () => {
      const connection = new ScriptedConnection()
      await new Neo4jClient({ connection }).dropConstraint({ kind: 'unique', label: 'User', properties: ['id'], name: 'user_id' })
      expect(connection.queries).toEqual(['DROP CONSTRAINT user_id IF EXISTS'])
    })

    it('has no label index', async () => {
      const db = new Neo4jClient({ connection: new ScriptedConnection() })
      await expect(db.createIndex({ kind: 'index', label: 'User', properties: [] })).rejects.toThrow(UsageError)
    })
  })
})
