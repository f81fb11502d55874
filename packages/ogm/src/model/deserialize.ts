/**
 * Deserialization
 *
 * Turns driver values into model instances and plain values. Nodes and
 * relationships are dispatched to registered definitions; whatever matches
 * none comes back as a generic graph object.
 */

import { isNode, isPath, isRelationship, type Node, type Relationship } from 'neo4j-driver'
import type { ModelRegistry } from '../schema'
import { fromDriverInteger, fromDriverTemporal } from '../serializer'
import type { PropertyMap } from '../utils'
import {
  GraphNode,
  GraphPath,
  GraphRelationship,
  type NodeValue,
  type RelationshipValue,
} from './graph-object'

function toId(value: unknown): number {
  const converted = fromDriverInteger(value)
  if (converted === undefined) {
    return typeof value === 'number' ? value : Number(value)
  }
  return Number(converted)
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function deserializeProperties(properties: object, registry?: ModelRegistry): PropertyMap {
  const result: PropertyMap = {}
  for (const [key, value] of Object.entries(properties)) {
    result[key] = deserialize(value, registry)
  }
  return result
}

export function deserializeNode(node: Node, registry?: ModelRegistry): NodeValue {
  const id = toId(node.identity)
  const properties = deserializeProperties(node.properties, registry)
  const definition = registry?.resolveNode(node.labels)
  if (definition) {
    return definition.hydrate(id, properties)
  }
  return new GraphNode(id, new Set(node.labels), properties)
}

export function deserializeRelationship(relationship: Relationship, registry?: ModelRegistry): RelationshipValue {
  const id = toId(relationship.identity)
  const startId = toId(relationship.start)
  const endId = toId(relationship.end)
  const properties = deserializeProperties(relationship.properties, registry)
  const definition = registry?.resolveRelationship(relationship.type)
  if (definition) {
    return definition.hydrate(id, startId, endId, properties)
  }
  return new GraphRelationship(id, relationship.type, startId, endId, properties)
}

/**
 * Convert a value returned by the driver.
 *
 * - nodes and relationships: registered model instance, else GraphNode / GraphRelationship
 * - paths: GraphPath, nodes and relationships in traversal order
 * - integers: number, or bigint outside the safe range
 * - temporals: TemporalValue
 * - lists and maps: converted element-wise
 */
export function deserialize(value: unknown, registry?: ModelRegistry): unknown {
  if (value === null || value === undefined || typeof value !== 'object') {
    return value
  }

  if (isNode(value)) return deserializeNode(value, registry)
  if (isRelationship(value)) return deserializeRelationship(value, registry)
  if (isPath(value)) {
    const nodes: NodeValue[] = [deserializeNode(value.start, registry)]
    const relationships: RelationshipValue[] = []
    for (const segment of value.segments) {
      relationships.push(deserializeRelationship(segment.relationship, registry))
      nodes.push(deserializeNode(segment.end, registry))
    }
    return new GraphPath(nodes, relationships)
  }

  const integer = fromDriverInteger(value)
  if (integer !== undefined) return integer

  const temporal = fromDriverTemporal(value)
  if (temporal) return temporal

  if (Array.isArray(value)) {
    return value.map((item: unknown) => deserialize(item, registry))
  }
  if (isPlainObject(value)) {
    return deserializeProperties(value, registry)
  }
  return value
}
