/**
 * Model Registry
 *
 * Explicit registration of node and relationship definitions. The registry
 * drives deserialization dispatch and collects the constraints and indexes
 * the definitions declare.
 */

import { AmbiguousDispatchError } from '../errors'
import type { SchemaClient } from '../executor/provider'
import { createLogger } from '../utils/logger'
import { dedupeDescriptors, isConstraint } from './descriptors'
import type { ModelDefinition, NodeDefinition, RelationshipDefinition, SchemaDescriptor } from './types'

const logger = createLogger('registry')

function sameLabels(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && [...a].every((label) => b.has(label))
}

/**
 * Registered definitions, keyed by model name (nodes) and by type
 * (relationships).
 *
 * @example
 * ```typescript
 * const registry = new ModelRegistry().register(User, Streamer, Follows)
 * registry.resolveNode(['Streamer', 'User']) // Streamer
 * await registry.syncSchema(db)
 * ```
 */
export class ModelRegistry {
  private readonly nodes = new Map<string, NodeDefinition>()
  private readonly relationships = new Map<string, RelationshipDefinition>()

  register(...definitions: ModelDefinition[]): this {
    for (const definition of definitions) {
      if (definition.kind === 'node') {
        this.registerNode(definition)
      } else {
        this.registerRelationship(definition)
      }
    }
    return this
  }

  unregister(...definitions: ModelDefinition[]): this {
    for (const definition of definitions) {
      if (definition.kind === 'node') {
        if (this.nodes.get(definition.name) === definition) this.nodes.delete(definition.name)
      } else if (this.relationships.get(definition.type) === definition) {
        this.relationships.delete(definition.type)
      }
    }
    return this
  }

  /** Remove every definition */
  clear(): void {
    this.nodes.clear()
    this.relationships.clear()
  }

  get nodeDefinitions(): NodeDefinition[] {
    return [...this.nodes.values()]
  }

  get relationshipDefinitions(): RelationshipDefinition[] {
    return [...this.relationships.values()]
  }

  // ===========================================================================
  // DISPATCH
  // ===========================================================================

  /**
   * The most specific definition whose label set is contained in `labels`:
   * the largest label set wins, then the highest priority.
   *
   * @throws AmbiguousDispatchError when several definitions remain tied
   */
  resolveNode(labels: Iterable<string>): NodeDefinition | undefined {
    const actual = new Set(labels)
    const candidates = this.nodeDefinitions.filter((definition) =>
      [...definition.labels].every((label) => actual.has(label)),
    )
    if (candidates.length === 0) return undefined

    const size = Math.max(...candidates.map((definition) => definition.labels.size))
    const largest = candidates.filter((definition) => definition.labels.size === size)
    const priority = Math.max(...largest.map((definition) => definition.priority))
    const best = largest.filter((definition) => definition.priority === priority)

    const [winner] = best
    if (best.length > 1 || !winner) {
      throw new AmbiguousDispatchError(
        [...actual],
        best.map((definition) => definition.name),
      )
    }
    return winner
  }

  resolveRelationship(type: string): RelationshipDefinition | undefined {
    return this.relationships.get(type)
  }

  // ===========================================================================
  // SCHEMA
  // ===========================================================================

  /** Existence and uniqueness constraints of every registered node */
  constraints(): SchemaDescriptor[] {
    return this.descriptors().filter(isConstraint)
  }

  /** Label and label-property indexes of every registered node */
  indexes(): SchemaDescriptor[] {
    return this.descriptors().filter((descriptor) => !isConstraint(descriptor))
  }

  /**
   * Bring the database's constraints and indexes in line with the registry.
   */
  async syncSchema(client: SchemaClient): Promise<void> {
    await client.ensureConstraints(this.constraints())
    await client.ensureIndexes(this.indexes())
  }

  private descriptors(): SchemaDescriptor[] {
    return dedupeDescriptors(this.nodeDefinitions.flatMap((definition) => definition.descriptors()))
  }

  private registerNode(definition: NodeDefinition): void {
    for (const existing of this.nodes.values()) {
      if (existing !== definition && sameLabels(existing.labels, definition.labels)) {
        logger.warn(
          { labels: [...definition.labels], existing: existing.name, added: definition.name },
          'Label set registered twice',
        )
      }
    }
    this.nodes.set(definition.name, definition)
    logger.debug({ model: definition.name, labels: [...definition.labels] }, 'Registered node definition')
  }

  private registerRelationship(definition: RelationshipDefinition): void {
    const existing = this.relationships.get(definition.type)
    if (existing && existing !== definition) {
      logger.warn({ type: definition.type, existing: existing.name, added: definition.name }, 'Relationship type registered twice')
    }
    this.relationships.set(definition.type, definition)
    logger.debug({ model: definition.name, type: definition.type }, 'Registered relationship definition')
  }
}
