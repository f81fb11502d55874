/**
 * Memgraph Triggers
 *
 * Statements run by the database on graph changes, before or after the
 * transaction commits.
 */

import { DatabaseError, UsageError } from '../../errors'
import { escapeName } from '../../serializer'
import type { ResultRow } from '../provider'
import { readString } from '../schema-rows'

export const TRIGGER_EVENTS = ['CREATE', 'UPDATE', 'DELETE'] as const
export type TriggerEvent = (typeof TRIGGER_EVENTS)[number]

export const TRIGGER_PHASES = ['BEFORE', 'AFTER'] as const
export type TriggerPhase = (typeof TRIGGER_PHASES)[number]

export type TriggerObject = 'node' | 'relationship'

const OBJECT_PATTERNS: Record<TriggerObject, string> = {
  node: '()',
  relationship: '-->',
}

/**
 * A trigger. Without an event it fires on any change; without an object it
 * fires for nodes and relationships alike.
 *
 * @example
 * ```typescript
 * await db.createTrigger({
 *   name: 'stamp_users',
 *   event: 'CREATE',
 *   object: 'node',
 *   phase: 'BEFORE',
 *   statement: 'UNWIND createdVertices AS v SET v.createdAt = timestamp()',
 * })
 * ```
 */
export interface Trigger {
  name: string
  event?: TriggerEvent
  object?: TriggerObject
  phase: TriggerPhase
  statement: string
}

function isTriggerEvent(value: string): value is TriggerEvent {
  return (TRIGGER_EVENTS as readonly string[]).includes(value)
}

function isTriggerPhase(value: string): value is TriggerPhase {
  return (TRIGGER_PHASES as readonly string[]).includes(value)
}

/**
 * `CREATE TRIGGER name [ON [pattern] event] phase COMMIT EXECUTE statement;`
 *
 * @throws UsageError for an object without an event
 */
export function triggerStatement(trigger: Trigger): string {
  if (trigger.object && !trigger.event) {
    throw new UsageError(`Trigger '${trigger.name}' names an object but no event`)
  }
  const pattern = trigger.object ? `${OBJECT_PATTERNS[trigger.object]} ` : ''
  const on = trigger.event ? ` ON ${pattern}${trigger.event}` : ''
  return `CREATE TRIGGER ${escapeName(trigger.name)}${on} ${trigger.phase} COMMIT EXECUTE ${trigger.statement};`
}

/**
 * Read a `SHOW TRIGGERS` row. The event column is `ANY`, an event, or a
 * pattern followed by an event (`() CREATE`, `--> UPDATE`).
 */
export function readTrigger(row: ResultRow): Trigger {
  const name = readString(row, 'trigger name')
  const [phase = ''] = readString(row, 'phase').split(' ')
  if (!isTriggerPhase(phase)) {
    throw new DatabaseError(`Unknown phase '${phase}' for trigger '${name}'`)
  }
  const trigger: Trigger = { name, phase, statement: readString(row, 'statement') }

  const parts = readString(row, 'event type').split(' ')
  const event = parts[parts.length - 1] ?? ''
  if (event === 'ANY') return trigger
  if (!isTriggerEvent(event)) {
    throw new DatabaseError(`Unknown event '${event}' for trigger '${name}'`)
  }
  trigger.event = event
  if (parts[0] === OBJECT_PATTERNS.node) trigger.object = 'node'
  if (parts[0] === OBJECT_PATTERNS.relationship) trigger.object = 'relationship'
  return trigger
}
