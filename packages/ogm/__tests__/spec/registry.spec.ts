/**
 * Model Registry Tests
 *
 * Dispatch of labels to definitions and schema synchronisation.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { AmbiguousDispatchError, ModelRegistry, node } from '../../src'
import { FakeClient } from './fixtures/fake-client'
import { Document, Follows, Streamer, User } from './fixtures/models'

describe('ModelRegistry', () => {
  let registry: ModelRegistry

  beforeEach(() => {
    registry = new ModelRegistry().register(User, Streamer, Follows)
  })

  // ===========================================================================
  // DISPATCH
  // ===========================================================================

  describe('resolveNode', () => {
    it('picks the definition with the largest contained label set', () => {
      expect(registry.resolveNode(['User'])).toBe(User)
      expect(registry.resolveNode(['Streamer', 'User'])).toBe(Streamer)
      expect(registry.resolveNode(['User', 'Streamer'])).toBe(Streamer)
    })

    it('ignores labels no definition declares', () => {
      expect(registry.resolveNode(['User', 'Beta'])).toBe(User)
    })

    it('returns undefined when nothing matches', () => {
      expect(registry.resolveNode(['Other'])).toBeUndefined()
      expect(registry.resolveNode(['Streamer'])).toBeUndefined()
    })

    it('breaks ties by priority', () => {
      const Low = node({ name: 'Low', label: 'A', extraLabels: ['B'], fields: {} })
      const High = node({ name: 'High', label: 'B', extraLabels: ['A'], fields: {}, priority: 1 })
      registry.register(Low, High)
      expect(registry.resolveNode(['A', 'B'])).toBe(High)
    })

    it('refuses to choose between equally specific definitions', () => {
      const First = node({ name: 'First', label: 'A', extraLabels: ['B'], fields: {} })
      const Second = node({ name: 'Second', label: 'B', extraLabels: ['A'], fields: {} })
      registry.register(First, Second)
      expect(() => registry.resolveNode(['A', 'B'])).toThrow(AmbiguousDispatchError)
    })
  })

  describe('resolveRelationship', () => {
    it('matches the type exactly', () => {
      expect(registry.resolveRelationship('FOLLOWS')).toBe(Follows)
      expect(registry.resolveRelationship('follows')).toBeUndefined()
    })
  })

  describe('registration', () => {
    it('unregisters and clears definitions', () => {
      registry.unregister(Streamer)
      expect(registry.nodeDefinitions).toEqual([User])
      registry.clear()
      expect(registry.nodeDefinitions).toEqual([])
      expect(registry.relationshipDefinitions).toEqual([])
    })
  })

  // ===========================================================================
  // SCHEMA
  // ===========================================================================

  describe('schema', () => {
    it('collects deduplicated constraints and indexes', () => {
      expect(registry.constraints()).toEqual([
        { kind: 'unique', label: 'User', properties: ['id'] },
        { kind: 'exists', label: 'User', properties: ['name'] },
      ])
      expect(registry.indexes()).toEqual([{ kind: 'index', label: 'User', properties: ['name'] }])
    })

    it('brings the database in line with the registered definitions', async () => {
      const db = new FakeClient()
      db.indexes = [{ kind: 'index', label: 'Old', properties: ['x'] }]
      registry.register(Document)

      await registry.syncSchema(db)

      expect(db.constraints).toEqual([
        { kind: 'unique', label: 'User', properties: ['id'] },
        { kind: 'exists', label: 'User', properties: ['name'] },
        { kind: 'unique', label: 'Document', properties: ['slug'] },
      ])
      expect(db.indexes).toEqual([{ kind: 'index', label: 'User', properties: ['name'] }])
    })

    it('leaves an in-sync database unchanged', async () => {
      const db = new FakeClient()
      await registry.syncSchema(db)
      const constraints = [...db.constraints]
      const indexes = [...db.indexes]

      await registry.syncSchema(db)

      expect(db.constraints).toEqual(constraints)
      expect(db.indexes).toEqual(indexes)
    })
  })
})
