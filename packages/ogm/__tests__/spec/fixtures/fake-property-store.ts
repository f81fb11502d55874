/**
 * In-memory property store for tests.
 */

import type { PropertyStore } from '../../../src'

export class FakePropertyStore implements PropertyStore {
  readonly nodes = new Map<string, unknown>()
  readonly relationships = new Map<string, unknown>()

  async saveNodeProperty(nodeId: number, name: string, value: unknown): Promise<void> {
    this.nodes.set(`${nodeId}:${name}`, value)
  }

  async loadNodeProperty(nodeId: number, name: string): Promise<unknown> {
    return this.nodes.get(`${nodeId}:${name}`)
  }

  async saveRelationshipProperty(relationshipId: number, name: string, value: unknown): Promise<void> {
    this.relationships.set(`${relationshipId}:${name}`, value)
  }

  async loadRelationshipProperty(relationshipId: number, name: string): Promise<unknown> {
    return this.relationships.get(`${relationshipId}:${name}`)
  }
}
