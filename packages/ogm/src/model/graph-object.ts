/**
 * Graph Objects
 *
 * Nodes, relationships and paths returned by the database that match no
 * registered definition.
 */

import type { PropertyMap } from '../utils'
import type { ModelNode } from './model-node'
import type { ModelRelationship } from './model-relationship'

export class GraphNode {
  constructor(
    readonly id: number,
    readonly labels: ReadonlySet<string>,
    readonly properties: PropertyMap,
  ) {}

  toJSON(): { id: number; labels: string[]; properties: PropertyMap } {
    return { id: this.id, labels: [...this.labels], properties: this.properties }
  }
}

export class GraphRelationship {
  constructor(
    readonly id: number,
    readonly type: string,
    readonly startId: number,
    readonly endId: number,
    readonly properties: PropertyMap,
  ) {}

  toJSON(): { id: number; type: string; startId: number; endId: number; properties: PropertyMap } {
    return {
      id: this.id,
      type: this.type,
      startId: this.startId,
      endId: this.endId,
      properties: this.properties,
    }
  }
}

export type NodeValue = GraphNode | ModelNode<object>

export type RelationshipValue = GraphRelationship | ModelRelationship<object>

/**
 * A path in traversal order: `relationships[i]` joins `nodes[i]` and
 * `nodes[i + 1]`.
 */
export class GraphPath {
  constructor(
    readonly nodes: readonly NodeValue[],
    readonly relationships: readonly RelationshipValue[],
  ) {}

  /** Number of relationships */
  get length(): number {
    return this.relationships.length
  }
}
