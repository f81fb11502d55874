/**
 * Model Declaration Tests
 *
 * Field builders, node and relationship definitions and the constraint and
 * index descriptors they declare.
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  ValidationError,
  descriptorKey,
  diffDescriptors,
  field,
  node,
  relationship,
  type SchemaDescriptor,
} from '../../src'
import { Follows, Streamer, User } from './fixtures/models'

describe('field', () => {
  it('returns a new builder from every modifier', () => {
    const base = field(z.string())
    const unique = base.unique()
    expect(base.options).toEqual({})
    expect(unique.options).toEqual({ unique: true })
    expect(unique.index().exists().onDisk().label('Other').options).toEqual({
      unique: true,
      index: true,
      exists: true,
      onDisk: true,
      label: 'Other',
    })
  })

  it('takes options directly', () => {
    expect(field(z.number(), { index: true, default: 1 }).options).toEqual({ index: true, default: 1 })
  })
})

describe('node', () => {
  it('uses the name as its label', () => {
    expect(User.label).toBe('User')
    expect([...User.labels]).toEqual(['User'])
  })

  it('takes its own label, extra labels and trait labels', () => {
    const Admin = node({ name: 'Admin', label: 'Administrator', extraLabels: ['Staff'], traits: [User], fields: {} })
    expect(Admin.label).toBe('Administrator')
    expect([...Admin.labels]).toEqual(['Administrator', 'Staff', 'User'])
  })

  it('inherits trait fields before its own', () => {
    expect(Object.keys(Streamer.fields)).toEqual(['id', 'name', 'age', 'followers'])
  })

  it('applies defaults on creation', () => {
    expect(Streamer.create({ id: 's1' }).properties).toEqual({ id: 's1', followers: 0 })
    expect(Streamer.create({ id: 's1', followers: 5 }).properties).toEqual({ id: 's1', followers: 5 })
  })

  it('validates values on creation', () => {
    expect(() => User.create({ id: 'u1', age: -1 })).toThrow(ValidationError)
  })

  it('names the invalid field', () => {
    try {
      User.create({ id: 'u1', age: 1.5 })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.field).toBe('age')
        expect(error.received).toBe(1.5)
      }
    }
  })

  it('drops unknown keys when parsing', () => {
    expect(User.parse({ id: 'u1', extra: 1 })).toEqual({ id: 'u1' })
  })

  it('validates values set on an instance', () => {
    const user = User.create({ id: 'u1' })
    user.set('age', 30)
    expect(user.get('age')).toBe(30)
    expect(() => user.set('age', -5)).toThrow(ValidationError)
    expect(user.get('age')).toBe(30)
  })
})

describe('relationship', () => {
  it('uses the name as its type unless given one', () => {
    expect(relationship({ name: 'LIKES' }).type).toBe('LIKES')
    expect(Follows.type).toBe('FOLLOWS')
  })

  it('keeps its endpoints', () => {
    const follows = Follows.create(1, { id: 2 }, { since: 2020 })
    expect(follows.toJSON()).toEqual({ id: null, type: 'FOLLOWS', startId: 1, endId: 2, properties: { since: 2020 } })
  })
})

// =============================================================================
// DESCRIPTORS
// =============================================================================

describe('descriptors', () => {
  it('derives constraints and indexes from field options', () => {
    expect(User.descriptors()).toEqual([
      { kind: 'unique', label: 'User', properties: ['id'] },
      { kind: 'index', label: 'User', properties: ['name'] },
      { kind: 'exists', label: 'User', properties: ['name'] },
    ])
  })

  it('includes the descriptors of traits', () => {
    expect(Streamer.descriptors()).toEqual(User.descriptors())
  })

  it('honours label overrides and node-level label indexes', () => {
    const Tagged = node({
      name: 'Tagged',
      index: true,
      fields: { code: field(z.string()).unique().label('Code') },
    })
    expect(Tagged.descriptors()).toEqual([
      { kind: 'unique', label: 'Code', properties: ['code'] },
      { kind: 'index', label: 'Tagged', properties: [] },
    ])
  })

  it('keys descriptors by kind, label and sorted properties', () => {
    expect(descriptorKey({ kind: 'unique', label: 'User', properties: ['b', 'a'] })).toBe('unique:User:a,b')
    expect(descriptorKey({ kind: 'index', label: 'User', properties: [] })).toBe('index:User:')
  })

  it('diffs existing against desired descriptors', () => {
    const existing: SchemaDescriptor[] = [
      { kind: 'index', label: 'User', properties: ['name'], name: 'idx_name' },
      { kind: 'index', label: 'Old', properties: ['x'], name: 'idx_old' },
    ]
    const desired: SchemaDescriptor[] = [
      { kind: 'index', label: 'User', properties: ['name'] },
      { kind: 'index', label: 'User', properties: ['age'] },
      { kind: 'index', label: 'User', properties: ['age'] },
    ]
    expect(diffDescriptors(existing, desired)).toEqual({
      missing: [{ kind: 'index', label: 'User', properties: ['age'] }],
      obsolete: [{ kind: 'index', label: 'Old', properties: ['x'], name: 'idx_old' }],
    })
  })
})
