/**
 * Schema Builder Functions
 *
 * Fluent API for declaring node and relationship models with full type
 * inference of their property maps.
 */

import { z } from 'zod'
import { ValidationError } from '../errors'
import { ModelNode, ModelRelationship, type NodeRef } from '../model'
import type { PropertyMap } from '../utils'
import { dedupeDescriptors, fieldDescriptors } from './descriptors'
import type {
  FieldDefinition,
  FieldOptions,
  FieldShape,
  FieldValues,
  NodeDefinition,
  NodeValues,
  RelationshipDefinition,
  SchemaDescriptor,
} from './types'

// =============================================================================
// FIELD BUILDER
// =============================================================================

/**
 * Immutable field declaration. Every modifier returns a new builder.
 *
 * @example
 * ```typescript
 * const email = field(z.string().email()).unique().index()
 * ```
 */
export class FieldBuilder<T extends z.ZodTypeAny = z.ZodTypeAny> implements FieldDefinition<T> {
  constructor(
    readonly schema: T,
    readonly options: Readonly<FieldOptions> = {},
  ) {}

  index(): FieldBuilder<T> {
    return this.with({ index: true })
  }

  exists(): FieldBuilder<T> {
    return this.with({ exists: true })
  }

  unique(): FieldBuilder<T> {
    return this.with({ unique: true })
  }

  onDisk(): FieldBuilder<T> {
    return this.with({ onDisk: true })
  }

  /** Declare this field's index or constraint on another label */
  label(name: string): FieldBuilder<T> {
    return this.with({ label: name })
  }

  default(value: z.input<T>): FieldBuilder<T> {
    return this.with({ default: value })
  }

  private with(options: FieldOptions): FieldBuilder<T> {
    return new FieldBuilder(this.schema, { ...this.options, ...options })
  }
}

/**
 * Declare a field from a zod schema.
 *
 * @example
 * ```typescript
 * field(z.string()).unique()
 * field(z.string(), { unique: true })   // same field
 * ```
 */
export function field<T extends z.ZodTypeAny>(schema: T, options: FieldOptions = {}): FieldBuilder<T> {
  return new FieldBuilder(schema, options)
}

// =============================================================================
// PROPERTY PARSING
// =============================================================================

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`
  if (typeof value === 'bigint') return `${value}n`
  return String(value)
}

/**
 * Build a validator for a field shape. Unknown keys are dropped, unset
 * fields stay unset.
 */
function createParser<P extends object>(modelName: string, fields: Readonly<FieldShape>): (input: unknown) => P {
  const shape: z.ZodRawShape = {}
  for (const [name, definition] of Object.entries(fields)) {
    shape[name] = definition.schema.optional()
  }
  const schema = z.object(shape)

  return (input) => {
    const result = schema.safeParse(input)
    if (!result.success) {
      const issue = result.error.issues[0]
      const fieldName = issue ? issue.path.map(String).join('.') : undefined
      const received: unknown =
        fieldName !== undefined && typeof input === 'object' && input !== null
          ? Object.entries(input).find(([key]) => key === fieldName)?.[1]
          : undefined
      throw new ValidationError(
        `Invalid ${modelName}${fieldName ? `.${fieldName}` : ''}: ${issue?.message ?? 'invalid value'} (got ${describeValue(received)})`,
        fieldName,
        issue?.message,
        received,
      )
    }
    return result.data as P
  }
}

function withDefaults(fields: Readonly<FieldShape>, properties: object): PropertyMap {
  const values: PropertyMap = { ...properties }
  for (const [name, definition] of Object.entries(fields)) {
    if (values[name] === undefined && definition.options.default !== undefined) {
      values[name] = definition.options.default
    }
  }
  return values
}

// =============================================================================
// NODE BUILDER
// =============================================================================

/**
 * Configuration options for node definition.
 */
export interface NodeConfig<F extends FieldShape, T extends readonly NodeDefinition[]> {
  /** Model name; also the label unless `label` is given */
  name: string

  /** Own label */
  label?: string

  /** Labels added to the label set without defining a model of their own */
  extraLabels?: readonly string[]

  /** Parent definitions whose labels and fields this node takes on */
  traits?: T

  fields: F

  /** Create a label index on the own label */
  index?: boolean

  /** Dispatch tie-break (default 0) */
  priority?: number
}

/**
 * Creates a node definition.
 *
 * The label set is the own label, the extra labels, then every trait's
 * label set, so a node defined with `traits: [User]` is stored with both
 * labels.
 *
 * @example
 * ```typescript
 * const User = node({
 *   name: 'User',
 *   fields: {
 *     id: field(z.string()).unique(),
 *     name: field(z.string()).index().exists(),
 *   },
 * })
 *
 * const Streamer = node({
 *   name: 'Streamer',
 *   traits: [User],
 *   fields: { followers: field(z.number().int()) },
 * })
 *
 * Streamer.labels // Set { 'Streamer', 'User' }
 * ```
 */
export function node<F extends FieldShape, T extends readonly NodeDefinition[] = []>(
  config: NodeConfig<F, T>,
): NodeDefinition<NodeValues<F, T>> {
  type P = NodeValues<F, T>

  const traits: readonly NodeDefinition[] = config.traits ?? []
  const label = config.label ?? config.name

  const labels = new Set<string>([label, ...(config.extraLabels ?? [])])
  for (const trait of traits) {
    for (const traitLabel of trait.labels) labels.add(traitLabel)
  }

  const fields: FieldShape = {}
  for (const trait of traits) Object.assign(fields, trait.fields)
  Object.assign(fields, config.fields)

  const parse = createParser<P>(config.name, fields)

  const definition: NodeDefinition<P> = {
    kind: 'node',
    name: config.name,
    label,
    labels,
    fields,
    traits,
    index: config.index ?? false,
    priority: config.priority ?? 0,

    descriptors(): SchemaDescriptor[] {
      const own = fieldDescriptors(label, config.fields)
      if (config.index) own.push({ kind: 'index', label, properties: [] })
      return dedupeDescriptors([...own, ...traits.flatMap((trait) => trait.descriptors())])
    },

    parse,

    create(properties?: P): ModelNode<P> {
      return new ModelNode(definition, parse(withDefaults(fields, properties ?? {})))
    },

    hydrate(id: number, properties: PropertyMap): ModelNode<P> {
      return new ModelNode(definition, parse(properties), id)
    },
  }

  return definition
}

// =============================================================================
// RELATIONSHIP BUILDER
// =============================================================================

/**
 * Configuration options for relationship definition.
 */
export interface RelationshipConfig<F extends FieldShape> {
  /** Model name; also the relationship type unless `type` is given */
  name: string

  type?: string

  fields?: F

  /** Dispatch tie-break (default 0) */
  priority?: number
}

/**
 * Creates a relationship definition.
 *
 * @example
 * ```typescript
 * const Follows = relationship({
 *   name: 'Follows',
 *   type: 'FOLLOWS',
 *   fields: { since: field(z.number().int()) },
 * })
 *
 * const follows = Follows.create(alice, bob, { since: 2020 })
 * await follows.save(db)
 * ```
 */
export function relationship<F extends FieldShape = Record<string, never>>(
  config: RelationshipConfig<F>,
): RelationshipDefinition<FieldValues<F>> {
  type P = FieldValues<F>

  const fields: FieldShape = { ...config.fields }
  const parse = createParser<P>(config.name, fields)

  const definition: RelationshipDefinition<P> = {
    kind: 'relationship',
    name: config.name,
    type: config.type ?? config.name,
    fields,
    priority: config.priority ?? 0,

    parse,

    create(start: NodeRef, end: NodeRef, properties?: P): ModelRelationship<P> {
      return new ModelRelationship(definition, start, end, parse(withDefaults(fields, properties ?? {})))
    },

    hydrate(id: number, startId: number, endId: number, properties: PropertyMap): ModelRelationship<P> {
      return new ModelRelationship(definition, startId, endId, parse(properties), id)
    },
  }

  return definition
}
