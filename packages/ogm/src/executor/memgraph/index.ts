/**
 * Memgraph Module
 */

export { MemgraphClient } from './client'
export type { MemgraphClientOptions, Procedure } from './client'
export { TRIGGER_EVENTS, TRIGGER_PHASES, readTrigger, triggerStatement } from './triggers'
export type { Trigger, TriggerEvent, TriggerObject, TriggerPhase } from './triggers'
