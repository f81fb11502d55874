/**
 * Core Schema Type Definitions
 *
 * A node definition maps a declared set of fields onto a label set; a
 * relationship definition maps them onto a relationship type. Definitions
 * are the source of truth for constraints, indexes and deserialization.
 *
 * Every field is optional on an instance: an unset field is simply absent
 * from the stored property map.
 */

import { type z } from 'zod'
import type { ModelNode, ModelRelationship, NodeRef } from '../model'
import type { Prettify, PropertyMap, UnionToIntersection } from '../utils'

// =============================================================================
// FIELDS
// =============================================================================

/**
 * Storage and schema options of a field.
 */
export interface FieldOptions {
  /** Create a label-property index */
  index?: boolean
  /** Create an existence constraint */
  exists?: boolean
  /** Create a uniqueness constraint */
  unique?: boolean
  /** Keep the value in the side property store instead of the graph */
  onDisk?: boolean
  /** Label the index or constraint is declared on (defaults to the node's own label) */
  label?: string
  /** Value used when the field is not given at creation */
  default?: unknown
}

/**
 * A declared field: its zod schema plus storage options.
 *
 * @template T - Zod schema of the field value
 */
export interface FieldDefinition<T extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly schema: T
  readonly options: Readonly<FieldOptions>
}

export type FieldShape = Record<string, FieldDefinition>

/**
 * Property map type of a field shape.
 */
export type FieldValues<F extends FieldShape> = {
  [K in keyof F]?: z.output<F[K]['schema']>
}

// =============================================================================
// SCHEMA DESCRIPTORS
// =============================================================================

export type DescriptorKind = 'exists' | 'unique' | 'index'

/**
 * A constraint or index, compared structurally by kind, label and property set.
 *
 * A label index has no properties.
 */
export interface SchemaDescriptor {
  readonly kind: DescriptorKind
  readonly label: string
  readonly properties: readonly string[]
  /** Server-side name, where the database names its schema objects */
  readonly name?: string
  /** Managed by the database or by a constraint; never dropped on sync */
  readonly owned?: boolean
}

// =============================================================================
// NODE DEFINITION
// =============================================================================

/**
 * Definition of a node model.
 *
 * @template P - Property map of the model's instances
 */
export interface NodeDefinition<P extends object = PropertyMap> {
  readonly kind: 'node'

  /** Model name, used in errors and logs */
  readonly name: string

  /** Own label (the explicit label, or the name) */
  readonly label: string

  /** Own label, extra labels and every trait's labels, in that order */
  readonly labels: ReadonlySet<string>

  /** Trait fields overridden by own fields */
  readonly fields: Readonly<FieldShape>

  readonly traits: readonly NodeDefinition[]

  /** Whether the own label gets a label index */
  readonly index: boolean

  /** Breaks dispatch ties between equally specific definitions */
  readonly priority: number

  /** Constraints and indexes declared by this definition and its traits */
  descriptors(): SchemaDescriptor[]

  /** Validate a property map against the field schemas */
  parse(input: unknown): P

  /** New unsaved instance, defaults applied */
  create(properties?: P): ModelNode<P>

  /** Instance for a stored node */
  hydrate(id: number, properties: PropertyMap): ModelNode<P>
}

/**
 * Property map type of a node definition.
 */
export type NodeProps<D> = D extends NodeDefinition<infer P> ? P : never

/**
 * Merged property map of a list of traits.
 */
export type TraitProps<T extends readonly NodeDefinition[]> = UnionToIntersection<NodeProps<T[number]>>

/**
 * Property map of a node with own fields `F` and traits `T`.
 */
export type NodeValues<F extends FieldShape, T extends readonly NodeDefinition[]> = Prettify<
  FieldValues<F> & TraitProps<T>
>

// =============================================================================
// RELATIONSHIP DEFINITION
// =============================================================================

/**
 * Definition of a relationship model.
 *
 * @template P - Property map of the model's instances
 */
export interface RelationshipDefinition<P extends object = PropertyMap> {
  readonly kind: 'relationship'
  readonly name: string
  /** Relationship type (the explicit type, or the name) */
  readonly type: string
  readonly fields: Readonly<FieldShape>
  readonly priority: number

  parse(input: unknown): P

  /** New unsaved relationship between two nodes */
  create(start: NodeRef, end: NodeRef, properties?: P): ModelRelationship<P>

  hydrate(id: number, startId: number, endId: number, properties: PropertyMap): ModelRelationship<P>
}

export type RelationshipProps<D> = D extends RelationshipDefinition<infer P> ? P : never

export type ModelDefinition = NodeDefinition | RelationshipDefinition
