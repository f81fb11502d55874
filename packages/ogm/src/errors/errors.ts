/**
 * Custom Error Classes
 */

/**
 * Base error for everything thrown by the OGM.
 */
export class GraphOgmError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'GraphOgmError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Serialization error.
 * Thrown when a value has no Cypher literal form.
 */
export class SerializationError extends GraphOgmError {
  constructor(
    message: string,
    public readonly value?: unknown,
  ) {
    super(message)
    this.name = 'SerializationError'
  }
}

/**
 * Validation error.
 * Thrown when model data is missing, malformed or conflicts with stored data.
 */
export class ValidationError extends GraphOgmError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly expected?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Usage error.
 * Thrown when the query builder or a client is driven in an invalid way.
 */
export class UsageError extends GraphOgmError {
  constructor(
    message: string,
    public readonly clause?: string,
  ) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Thrown when a pattern is linked in an impossible order, e.g. two nodes in a
 * row or a WHERE with nothing matched before it.
 */
export class InvalidMatchChainError extends UsageError {
  constructor(message = 'Invalid match query when linking!', clause?: string) {
    super(message, clause)
    this.name = 'InvalidMatchChainError'
  }
}

/**
 * Thrown when a projection has no variables to project.
 */
export class NoVariablesMatchedError extends UsageError {
  constructor(clause?: string) {
    super('No variables have been matched in the query', clause)
    this.name = 'NoVariablesMatchedError'
  }
}

/**
 * Thrown when a clause references a variable that is not in scope.
 */
export class UndeclaredVariableError extends UsageError {
  constructor(
    public readonly variable: string,
    clause: string,
    public readonly availableVariables: string[],
  ) {
    const available = availableVariables.length > 0 ? availableVariables.join(', ') : 'none'
    super(`Variable '${variable}' used in ${clause} is not declared (in scope: ${available})`, clause)
    this.name = 'UndeclaredVariableError'
  }
}

/**
 * Thrown when a modifier clause is appended where Cypher does not allow it.
 */
export class ClauseOrderError extends UsageError {
  constructor(clause: string, expectedAfter: string[]) {
    super(`${clause} can only follow ${expectedAfter.join(', ')}`, clause)
    this.name = 'ClauseOrderError'
  }
}

/**
 * Not found error.
 * Thrown when a load matched no rows.
 */
export class NotFoundError extends GraphOgmError {
  constructor(
    public readonly entity: string,
    public readonly criteria?: Record<string, unknown>,
  ) {
    const details =
      criteria && Object.keys(criteria).length > 0
        ? ` matching ${JSON.stringify(criteria, (_key, value: unknown) => (typeof value === 'bigint' ? `${value}n` : value))}`
        : ''
    super(`${entity} not found${details}`)
    this.name = 'NotFoundError'
  }
}

/**
 * Database error.
 * Wraps every failure reported by the driver or the server. The message is
 * the driver's message, unchanged.
 */
export class DatabaseError extends GraphOgmError {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cypher?: string,
    public readonly params?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'DatabaseError'
  }
}

/**
 * Thrown when a node matches several registered definitions that are equally
 * specific and equally prioritised.
 */
export class AmbiguousDispatchError extends GraphOgmError {
  constructor(
    public readonly labels: string[],
    public readonly candidates: string[],
  ) {
    super(
      `Labels [${labels.join(', ')}] match several definitions with the same specificity and priority: ${candidates.join(', ')}`,
    )
    this.name = 'AmbiguousDispatchError'
  }
}
