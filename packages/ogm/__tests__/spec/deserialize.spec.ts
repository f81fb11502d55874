/**
 * Deserialization Tests
 *
 * Driver values to model instances, graph objects and plain values.
 */

import { Date as DriverDate, Path, PathSegment, int } from 'neo4j-driver'
import { describe, it, expect } from 'vitest'
import {
  GraphNode,
  GraphPath,
  GraphRelationship,
  ModelNode,
  ModelRegistry,
  ModelRelationship,
  TemporalValue,
  deserialize,
} from '../../src'
import { Follows, Streamer, User, driverNode, driverRelationship } from './fixtures/models'

const registry = new ModelRegistry().register(User, Streamer, Follows)

describe('deserialize', () => {
  it('passes scalars through', () => {
    expect(deserialize(null)).toBeNull()
    expect(deserialize('x')).toBe('x')
    expect(deserialize(true)).toBe(true)
  })

  it('converts integers', () => {
    expect(deserialize(int(5))).toBe(5)
    expect(deserialize(int('9007199254740993'))).toBe(9007199254740993n)
  })

  it('converts temporals', () => {
    const value = deserialize(new DriverDate(2024, 1, 31))
    expect(value).toBeInstanceOf(TemporalValue)
    if (value instanceof TemporalValue) {
      expect(value.toCypher()).toBe("date('2024-01-31')")
    }
  })

  it('converts lists and maps element-wise', () => {
    expect(deserialize([int(1), { a: int(2), b: ['x'] }])).toEqual([1, { a: 2, b: ['x'] }])
  })

  // ===========================================================================
  // NODES AND RELATIONSHIPS
  // ===========================================================================

  describe('nodes', () => {
    it('returns a generic node without a registry', () => {
      const value = deserialize(driverNode(1, ['User'], { id: 'u1', age: int(30) }))
      expect(value).toBeInstanceOf(GraphNode)
      if (value instanceof GraphNode) {
        expect(value.toJSON()).toEqual({ id: 1, labels: ['User'], properties: { id: 'u1', age: 30 } })
      }
    })

    it('dispatches to the most specific definition', () => {
      const value = deserialize(driverNode(2, ['User', 'Streamer'], { id: 's1', followers: int(10) }), registry)
      expect(value).toBeInstanceOf(ModelNode)
      if (value instanceof ModelNode) {
        expect(value.definition).toBe(Streamer)
        expect(value.id).toBe(2)
        expect(value.properties).toEqual({ id: 's1', followers: 10 })
      }
    })

    it('returns a generic node for unregistered labels', () => {
      expect(deserialize(driverNode(3, ['Robot'], {}), registry)).toBeInstanceOf(GraphNode)
    })
  })

  describe('relationships', () => {
    it('dispatches on the exact type', () => {
      const value = deserialize(driverRelationship(10, 1, 2, 'FOLLOWS', { since: int(2020) }), registry)
      expect(value).toBeInstanceOf(ModelRelationship)
      if (value instanceof ModelRelationship) {
        expect(value.toJSON()).toEqual({ id: 10, type: 'FOLLOWS', startId: 1, endId: 2, properties: { since: 2020 } })
      }
    })

    it('returns a generic relationship for unregistered types', () => {
      const value = deserialize(driverRelationship(11, 1, 2, 'LIKES', {}), registry)
      expect(value).toBeInstanceOf(GraphRelationship)
      if (value instanceof GraphRelationship) {
        expect(value.toJSON()).toEqual({ id: 11, type: 'LIKES', startId: 1, endId: 2, properties: {} })
      }
    })
  })

  describe('paths', () => {
    it('keeps nodes and relationships in traversal order', () => {
      const a = driverNode(1, ['User'], { id: 'a' })
      const b = driverNode(2, ['User'], { id: 'b' })
      const c = driverNode(3, ['Robot'], {})
      const ab = driverRelationship(10, 1, 2, 'FOLLOWS', {})
      const bc = driverRelationship(11, 2, 3, 'OWNS', {})
      const path = new Path(a, c, [new PathSegment(a, ab, b), new PathSegment(b, bc, c)])

      const value = deserialize(path, registry)

      expect(value).toBeInstanceOf(GraphPath)
      if (value instanceof GraphPath) {
        expect(value.length).toBe(2)
        expect(value.nodes.map((n) => n.id)).toEqual([1, 2, 3])
        expect(value.relationships.map((r) => r.id)).toEqual([10, 11])
        expect(value.nodes[2]).toBeInstanceOf(GraphNode)
        expect(value.relationships[0]).toBeInstanceOf(ModelRelationship)
      }
    })
  })
})
