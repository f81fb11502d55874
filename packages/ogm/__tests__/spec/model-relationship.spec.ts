/**
 * Model Relationship Persistence Tests
 */

import { int } from 'neo4j-driver'
import { describe, it, expect, beforeEach } from 'vitest'
import { ModelRegistry, NotFoundError, UsageError, ValidationError } from '../../src'
import { FakeClient } from './fixtures/fake-client'
import { FakePropertyStore } from './fixtures/fake-property-store'
import { Follows, User, driverRelationship } from './fixtures/models'

describe('ModelRelationship', () => {
  let db: FakeClient

  beforeEach(() => {
    db = new FakeClient('memgraph', new ModelRegistry().register(User, Follows))
  })

  describe('save', () => {
    it('creates the relationship between two existing nodes', async () => {
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', { since: int(2020) }) }])
      const follows = Follows.create(1, 2, { since: 2020 })

      await follows.save(db)

      expect(follows.id).toBe(10)
      expect(db.lastQuery).toBe(
        ' MATCH (start) MATCH (end) WHERE id(start) = 1 AND id(end) = 2' +
          ' CREATE (start)-[relationship:FOLLOWS {since: 2020}]->(end) RETURN relationship ',
      )
    })

    it('reads endpoint ids from node instances', async () => {
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', {}) }])
      const alice = User.hydrate(1, { id: 'a' })
      const bob = User.hydrate(2, { id: 'b' })

      const follows = await Follows.create(alice, bob).save(db)

      expect(follows.startId).toBe(1)
      expect(follows.endId).toBe(2)
      expect(db.lastQuery).toBe(
        ' MATCH (start) MATCH (end) WHERE id(start) = 1 AND id(end) = 2' +
          ' CREATE (start)-[relationship:FOLLOWS]->(end) RETURN relationship ',
      )
    })

    it('needs saved endpoints', async () => {
      await expect(Follows.create(User.create({ id: 'x' }), 2).save(db)).rejects.toThrow(ValidationError)
      expect(db.queries).toHaveLength(0)
    })

    it('fails when an endpoint does not exist', async () => {
      await expect(Follows.create(1, 99).save(db)).rejects.toThrow(NotFoundError)
    })

    it('updates a relationship with an id', async () => {
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', { since: int(2021) }) }])
      const follows = Follows.hydrate(10, 1, 2, { since: 2020 })
      follows.set('since', 2021)

      await follows.save(db)

      expect(db.lastQuery).toBe(
        ' MATCH ()-[relationship:FOLLOWS]->() WHERE id(relationship) = 10' +
          ' SET relationship += {since: 2021} RETURN relationship ',
      )
    })

    it('writes onDisk values to the property store', async () => {
      const store = new FakePropertyStore()
      db.propertyStore = store
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', {}) }])

      await Follows.create(1, 2, { note: 'met at a meetup' }).save(db)

      expect(store.relationships.get('10:note')).toBe('met at a meetup')
    })

    it('needs a property store for onDisk values', async () => {
      await expect(Follows.create(1, 2, { note: 'hi' }).save(db)).rejects.toThrow(UsageError)
    })
  })

  describe('load', () => {
    beforeEach(() => {
      db.propertyStore = new FakePropertyStore()
    })

    it('loads by endpoints and set properties', async () => {
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', { since: int(2020) }) }])
      const follows = Follows.create(1, 2, { since: 2020 })

      await follows.load(db)

      expect(follows.id).toBe(10)
      expect(db.lastQuery).toBe(
        ' MATCH (start)-[relationship:FOLLOWS]->(end)' +
          ' WHERE id(start) = 1 AND id(end) = 2 AND relationship.since = 2020 RETURN relationship ',
      )
    })

    it('loads by id', async () => {
      db.respondWith([{ relationship: driverRelationship(10, 1, 2, 'FOLLOWS', { since: int(2020) }) }])
      const follows = Follows.hydrate(10, 1, 2, {})

      await follows.load(db)

      expect(follows.get('since')).toBe(2020)
      expect(db.lastQuery).toBe(' MATCH ()-[relationship:FOLLOWS]->() WHERE id(relationship) = 10 RETURN relationship ')
    })

    it('returns an existing relationship or creates one', async () => {
      db.respondWith([], [{ relationship: driverRelationship(11, 1, 2, 'FOLLOWS', {}) }])

      const [follows, created] = await Follows.create(1, 2).getOrCreate(db)

      expect(created).toBe(true)
      expect(follows.id).toBe(11)
    })
  })
})
