/**
 * Serializer Module
 *
 * Native values to Cypher literals, and driver values back to native ones.
 */

export {
  serialize,
  escapeName,
  toCypherLabels,
  toCypherProperties,
  toCypherProcedureArguments,
  PropertyVariable,
} from './value'
export type { QuoteStyle, SerializeOptions, ProcedureArgument } from './value'

export { TemporalValue, fromDriverTemporal, fromDriverInteger } from './temporal'
export type { TemporalKind, DurationComponents } from './temporal'
