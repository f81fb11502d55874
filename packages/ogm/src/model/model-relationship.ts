/**
 * Model Relationship
 *
 * An instance of a relationship definition between two nodes.
 */

import { NotFoundError, ValidationError } from '../errors'
import type { DatabaseClient } from '../executor/provider'
import type { QueryBuilder } from '../query'
import type { RelationshipDefinition } from '../schema'
import { escapeName } from '../serializer'
import type { PropertyMap } from '../utils'
import { partitionProperties, requireStore } from './model-node'
import { assertNoConflicts, collectRows, readRelationship, type StoredRelationship } from './records'

/**
 * An endpoint: a node id, or anything carrying one (a model or graph node).
 */
export type NodeRef = number | { readonly id: number | null }

function refId(ref: NodeRef): number | null {
  return typeof ref === 'number' ? ref : ref.id
}

/**
 * A relationship instance.
 *
 * Endpoints may be nodes that are not saved yet; their ids are read when the
 * relationship is saved.
 *
 * @example
 * ```typescript
 * const follows = Follows.create(alice, bob, { since: 2020 })
 * await alice.save(db)
 * await bob.save(db)
 * await follows.save(db)
 * ```
 */
export class ModelRelationship<P extends object = PropertyMap> {
  id: number | null
  private start: NodeRef
  private end: NodeRef
  private values: P

  constructor(
    readonly definition: RelationshipDefinition<P>,
    start: NodeRef,
    end: NodeRef,
    values: P,
    id: number | null = null,
  ) {
    this.start = start
    this.end = end
    this.values = values
    this.id = id
  }

  get type(): string {
    return this.definition.type
  }

  get startId(): number | null {
    return refId(this.start)
  }

  get endId(): number | null {
    return refId(this.end)
  }

  get properties(): P {
    return { ...this.values }
  }

  get<K extends keyof P>(key: K): P[K] {
    return this.values[key]
  }

  set<K extends keyof P>(key: K, value: P[K]): this {
    const next: PropertyMap = Object.fromEntries(Object.entries(this.values))
    next[String(key)] = value
    this.values = this.definition.parse(next)
    return this
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  /**
   * Create the relationship when it has no id, otherwise update it in place.
   *
   * @throws NotFoundError when an endpoint does not exist
   */
  async save(db: DatabaseClient): Promise<this> {
    const { stored, onDisk } = partitionProperties(this.definition.fields, this.values)
    const store = Object.keys(onDisk).length > 0 ? requireStore(db, this.definition.name) : undefined

    const saved = this.id === null ? await this.create(db, stored) : await this.update(db, this.id, stored)
    this.id = saved.id
    this.start = saved.startId
    this.end = saved.endId

    if (store) {
      for (const [name, value] of Object.entries(onDisk)) {
        await store.saveRelationshipProperty(saved.id, name, value)
      }
    }
    return this
  }

  /**
   * Refresh from the database, matched by id when set, otherwise by both
   * endpoints and every set property.
   */
  async load(db: DatabaseClient): Promise<this> {
    const local = this.definition.parse(this.values)
    const { stored: localStored } = partitionProperties(this.definition.fields, local)
    const diskFields = Object.entries(this.definition.fields)
      .filter(([, field]) => field.options.onDisk)
      .map(([name]) => name)
    const store = diskFields.length > 0 ? requireStore(db, this.definition.name) : undefined

    const { builder, criteria } = this.lookup(db, localStored)
    const rows = await collectRows(builder.return('relationship').executeAndFetch(), 2)
    const [row] = rows
    if (!row) {
      throw new NotFoundError(this.definition.name, criteria)
    }
    if (rows.length > 1) {
      throw new ValidationError(`${this.definition.name} lookup matched several relationships`)
    }

    const loaded = readRelationship(row, 'relationship')
    assertNoConflicts(this.definition.name, localStored, loaded.properties)

    const merged: PropertyMap = { ...loaded.properties, ...localStored }
    if (store) {
      for (const name of diskFields) {
        const value = Object.entries(local).find(([key]) => key === name)?.[1]
        merged[name] = value !== undefined ? value : await store.loadRelationshipProperty(loaded.id, name)
      }
    }

    this.values = this.definition.parse(merged)
    this.id = loaded.id
    this.start = loaded.startId
    this.end = loaded.endId
    return this
  }

  async getOrCreate(db: DatabaseClient): Promise<[this, boolean]> {
    try {
      await this.load(db)
      return [this, false]
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error
    }
    await this.save(db)
    return [this, true]
  }

  toJSON(): { id: number | null; type: string; startId: number | null; endId: number | null; properties: P } {
    return {
      id: this.id,
      type: this.type,
      startId: this.startId,
      endId: this.endId,
      properties: this.properties,
    }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  private endpoints(): { startId: number; endId: number } {
    const startId = this.startId
    const endId = this.endId
    if (startId === null || endId === null) {
      throw new ValidationError(`${this.definition.name} endpoints must be saved before the relationship`)
    }
    return { startId, endId }
  }

  private async create(db: DatabaseClient, stored: PropertyMap): Promise<StoredRelationship> {
    const { startId, endId } = this.endpoints()
    const builder = db
      .newQuery()
      .match()
      .node({ variable: 'start' })
      .match()
      .node({ variable: 'end' })
      .where('id(start)', '=', { literal: startId })
      .andWhere('id(end)', '=', { literal: endId })
      .create()
      .node({ variable: 'start' })
      .to({ variable: 'relationship', relationshipType: this.type, properties: stored })
      .node({ variable: 'end' })
      .return('relationship')

    const [row] = await collectRows(builder.executeAndFetch(), 1)
    if (!row) {
      throw new NotFoundError(`${this.definition.name} endpoints`, { start: startId, end: endId })
    }
    return readRelationship(row, 'relationship')
  }

  private async update(db: DatabaseClient, id: number, stored: PropertyMap): Promise<StoredRelationship> {
    const builder = db
      .newQuery()
      .match()
      .node()
      .to({ variable: 'relationship', relationshipType: this.type })
      .node()
      .where('id(relationship)', '=', { literal: id })
      .set('relationship', '+=', { literal: stored })
      .return('relationship')

    const [row] = await collectRows(builder.executeAndFetch(), 1)
    if (!row) {
      throw new NotFoundError(this.definition.name, { id })
    }
    return readRelationship(row, 'relationship')
  }

  private lookup(db: DatabaseClient, stored: PropertyMap): { builder: QueryBuilder; criteria: PropertyMap } {
    if (this.id !== null) {
      const builder = db
        .newQuery()
        .match()
        .node()
        .to({ variable: 'relationship', relationshipType: this.type })
        .node()
        .where('id(relationship)', '=', { literal: this.id })
      return { builder, criteria: { 'id(relationship)': this.id } }
    }

    const startId = this.startId
    const endId = this.endId
    if (startId === null || endId === null) {
      throw new ValidationError(`${this.definition.name} needs an id or both endpoint ids to load`)
    }

    const criteria: PropertyMap = { 'id(start)': startId, 'id(end)': endId }
    for (const [name, value] of Object.entries(stored)) {
      criteria[`relationship.${escapeName(name)}`] = value
    }

    const builder = db
      .newQuery()
      .match()
      .node({ variable: 'start' })
      .to({ variable: 'relationship', relationshipType: this.type })
      .node({ variable: 'end' })
    Object.entries(criteria).forEach(([item, value], position) => {
      if (position === 0) builder.where(item, '=', { literal: value })
      else builder.andWhere(item, '=', { literal: value })
    })
    return { builder, criteria }
  }
}
