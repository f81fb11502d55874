/**
 * Model Module
 *
 * Model instances, generic graph objects and deserialization.
 */

export { ModelNode } from './model-node'
export { ModelRelationship } from './model-relationship'
export type { NodeRef } from './model-relationship'
export { GraphNode, GraphRelationship, GraphPath } from './graph-object'
export type { NodeValue, RelationshipValue } from './graph-object'
export { deserialize, deserializeNode, deserializeRelationship } from './deserialize'
