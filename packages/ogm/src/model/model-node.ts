/**
 * Model Node
 *
 * An instance of a node definition, persisted through query builder calls.
 */

import { NotFoundError, UsageError, ValidationError } from '../errors'
import type { DatabaseClient, PropertyStore } from '../executor/provider'
import type { FieldShape, NodeDefinition } from '../schema'
import { escapeName } from '../serializer'
import type { PropertyMap } from '../utils'
import { assertNoConflicts, collectRows, readNode, type StoredNode } from './records'

/**
 * Split a property map into values stored on the graph and values kept in
 * the property store.
 */
export function partitionProperties(
  fields: Readonly<FieldShape>,
  values: object,
): { stored: PropertyMap; onDisk: PropertyMap } {
  const stored: PropertyMap = {}
  const onDisk: PropertyMap = {}
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined) continue
    if (fields[name]?.options.onDisk) {
      onDisk[name] = value
    } else {
      stored[name] = value
    }
  }
  return { stored, onDisk }
}

export function requireStore(db: DatabaseClient, entity: string): PropertyStore {
  if (!db.propertyStore) {
    throw new UsageError(`${entity} has onDisk fields but the client has no property store`)
  }
  return db.propertyStore
}

/**
 * A node instance.
 *
 * `id` is null until the node is saved or loaded.
 *
 * @example
 * ```typescript
 * const ron = User.create({ id: 'u1', name: 'Ron' })
 * await ron.save(db)
 * ron.id // 0
 *
 * const [user, created] = await User.create({ id: 'u1' }).getOrCreate(db)
 * ```
 */
export class ModelNode<P extends object = PropertyMap> {
  id: number | null
  private values: P

  constructor(
    readonly definition: NodeDefinition<P>,
    values: P,
    id: number | null = null,
  ) {
    this.values = values
    this.id = id
  }

  get labels(): ReadonlySet<string> {
    return this.definition.labels
  }

  /** A copy of the current property map */
  get properties(): P {
    return { ...this.values }
  }

  get<K extends keyof P>(key: K): P[K] {
    return this.values[key]
  }

  /** Set a field, validated against its schema */
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
   * Create the node when it has no id, otherwise update it in place.
   */
  async save(db: DatabaseClient): Promise<this> {
    const { stored, onDisk } = partitionProperties(this.definition.fields, this.values)
    const store = Object.keys(onDisk).length > 0 ? requireStore(db, this.definition.name) : undefined

    const saved = this.id === null ? await this.create(db, stored) : await this.update(db, this.id, stored)
    this.id = saved.id

    if (store) {
      for (const [name, value] of Object.entries(onDisk)) {
        await store.saveNodeProperty(saved.id, name, value)
      }
    }
    return this
  }

  /**
   * Refresh from the database, matched by id when set, otherwise by every
   * set unique or indexed field. Unset fields are filled in.
   *
   * @throws ValidationError when nothing identifies the node, when several
   *   nodes match, or when a set field differs from the stored value
   * @throws NotFoundError when no node matches
   */
  async load(db: DatabaseClient): Promise<this> {
    const local = this.definition.parse(this.values)
    const { stored: localStored } = partitionProperties(this.definition.fields, local)
    const diskFields = Object.entries(this.definition.fields)
      .filter(([, field]) => field.options.onDisk)
      .map(([name]) => name)
    const store = diskFields.length > 0 ? requireStore(db, this.definition.name) : undefined

    const criteria = this.lookupCriteria(localStored)
    const builder = db.newQuery().match().node({ variable: 'node', labels: [...this.labels] })
    Object.entries(criteria).forEach(([item, value], position) => {
      if (position === 0) builder.where(item, '=', { literal: value })
      else builder.andWhere(item, '=', { literal: value })
    })
    builder.return('node')

    const rows = await collectRows(builder.executeAndFetch(), 2)
    const [row] = rows
    if (!row) {
      throw new NotFoundError(this.definition.name, criteria)
    }
    if (rows.length > 1) {
      throw new ValidationError(
        `${this.definition.name} lookup by ${Object.keys(criteria).join(', ')} matched several nodes`,
      )
    }

    const loaded = readNode(row, 'node')
    assertNoConflicts(this.definition.name, localStored, loaded.properties)

    const merged: PropertyMap = { ...loaded.properties, ...localStored }
    if (store) {
      for (const name of diskFields) {
        const value = Object.entries(local).find(([key]) => key === name)?.[1]
        merged[name] = value !== undefined ? value : await store.loadNodeProperty(loaded.id, name)
      }
    }

    this.values = this.definition.parse(merged)
    this.id = loaded.id
    return this
  }

  /**
   * Load the node, or save it when no node matches.
   *
   * @returns the instance and whether it was created
   */
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

  toJSON(): { id: number | null; labels: string[]; properties: P } {
    return { id: this.id, labels: [...this.labels], properties: this.properties }
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  private async create(db: DatabaseClient, stored: PropertyMap): Promise<StoredNode> {
    const builder = db
      .newQuery()
      .create()
      .node({ variable: 'node', labels: [...this.labels], properties: stored })
      .return('node')

    const [row] = await collectRows(builder.executeAndFetch(), 1)
    if (!row) {
      throw new NotFoundError(this.definition.name)
    }
    return readNode(row, 'node')
  }

  private async update(db: DatabaseClient, id: number, stored: PropertyMap): Promise<StoredNode> {
    const builder = db
      .newQuery()
      .match()
      .node({ variable: 'node', labels: [...this.labels] })
      .where('id(node)', '=', { literal: id })
      .set('node', '+=', { literal: stored })
      .return('node')

    const [row] = await collectRows(builder.executeAndFetch(), 1)
    if (!row) {
      throw new NotFoundError(this.definition.name, { id })
    }
    return readNode(row, 'node')
  }

  private lookupCriteria(stored: PropertyMap): PropertyMap {
    if (this.id !== null) {
      return { 'id(node)': this.id }
    }

    const criteria: PropertyMap = {}
    for (const [name, value] of Object.entries(stored)) {
      const options = this.definition.fields[name]?.options
      if (options?.unique || options?.index) criteria[`node.${escapeName(name)}`] = value
    }
    if (Object.keys(criteria).length === 0) {
      throw new ValidationError(`${this.definition.name} has no unique or indexed field set to load by`)
    }
    return criteria
  }
}
