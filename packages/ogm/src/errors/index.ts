/**
 * Errors Module
 */

export {
  GraphOgmError,
  SerializationError,
  ValidationError,
  UsageError,
  InvalidMatchChainError,
  NoVariablesMatchedError,
  UndeclaredVariableError,
  ClauseOrderError,
  NotFoundError,
  DatabaseError,
  AmbiguousDispatchError,
} from './errors'
