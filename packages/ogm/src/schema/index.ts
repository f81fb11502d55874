/**
 * Schema Module
 *
 * Model declaration, schema descriptors and the registry.
 */

export { field, node, relationship, FieldBuilder } from './builders'
export type { NodeConfig, RelationshipConfig } from './builders'
export type {
  FieldOptions,
  FieldDefinition,
  FieldShape,
  FieldValues,
  DescriptorKind,
  SchemaDescriptor,
  NodeDefinition,
  NodeProps,
  NodeValues,
  TraitProps,
  RelationshipDefinition,
  RelationshipProps,
  ModelDefinition,
} from './types'
export {
  descriptorKey,
  dedupeDescriptors,
  diffDescriptors,
  fieldDescriptors,
  isConstraint,
} from './descriptors'
export type { DescriptorDiff } from './descriptors'
export { ModelRegistry } from './registry'
