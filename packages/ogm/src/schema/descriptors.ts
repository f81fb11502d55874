/**
 * Schema Descriptors
 *
 * Constraint and index descriptors derived from field options, and the set
 * arithmetic used to bring a database in line with them.
 */

import type { FieldShape, SchemaDescriptor } from './types'

/**
 * Structural key of a descriptor: kind, label and sorted properties.
 */
export function descriptorKey(descriptor: SchemaDescriptor): string {
  return `${descriptor.kind}:${descriptor.label}:${[...descriptor.properties].sort().join(',')}`
}

export function isConstraint(descriptor: SchemaDescriptor): boolean {
  return descriptor.kind !== 'index'
}

/**
 * Keep the first descriptor for every key.
 */
export function dedupeDescriptors(descriptors: Iterable<SchemaDescriptor>): SchemaDescriptor[] {
  const byKey = new Map<string, SchemaDescriptor>()
  for (const descriptor of descriptors) {
    const key = descriptorKey(descriptor)
    if (!byKey.has(key)) byKey.set(key, descriptor)
  }
  return [...byKey.values()]
}

/**
 * Descriptors declared by fields. Each field lands on its own label override,
 * or on `label`.
 */
export function fieldDescriptors(label: string, fields: Readonly<FieldShape>): SchemaDescriptor[] {
  const descriptors: SchemaDescriptor[] = []

  for (const [name, field] of Object.entries(fields)) {
    const target = field.options.label ?? label
    if (field.options.index) {
      descriptors.push({ kind: 'index', label: target, properties: [name] })
    }
    if (field.options.exists) {
      descriptors.push({ kind: 'exists', label: target, properties: [name] })
    }
    if (field.options.unique) {
      descriptors.push({ kind: 'unique', label: target, properties: [name] })
    }
  }

  return descriptors
}

export interface DescriptorDiff {
  /** Desired but not present */
  missing: SchemaDescriptor[]
  /** Present but not desired */
  obsolete: SchemaDescriptor[]
}

/**
 * Compare what the database has with what is wanted, by descriptor key.
 * Obsolete entries are the database's own (they carry its names).
 */
export function diffDescriptors(
  existing: readonly SchemaDescriptor[],
  desired: readonly SchemaDescriptor[],
): DescriptorDiff {
  const existingKeys = new Set(existing.map(descriptorKey))
  const desiredKeys = new Set(desired.map(descriptorKey))

  return {
    missing: dedupeDescriptors(desired.filter((d) => !existingKeys.has(descriptorKey(d)))),
    obsolete: dedupeDescriptors(existing.filter((d) => !desiredKeys.has(descriptorKey(d)))),
  }
}
