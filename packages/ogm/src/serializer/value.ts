/**
 * Value Serializer
 *
 * Converts native values into Cypher literal text.
 */

import { isInt } from 'neo4j-driver'
import { SerializationError } from '../errors'
import { fromDriverTemporal, TemporalValue } from './temporal'

export type QuoteStyle = "'" | '"'

export interface SerializeOptions {
  /** Quote used for string literals (default: single quote) */
  quote?: QuoteStyle
}

/**
 * A reference to a query variable, rendered without quotes.
 *
 * @example
 * ```typescript
 * foreach('i', '[1, 2, 3]', create().node({ variable: 'n', properties: { id: new PropertyVariable('i') } }))
 * // FOREACH ( i IN [1, 2, 3] | CREATE (n {id: i}) )
 * ```
 */
export class PropertyVariable {
  constructor(readonly name: string) {}

  toString(): string {
    return this.name
  }
}

/** Strings that pass through unquoted. */
const RAW_LITERALS = new Set(['null', 'true', 'false'])

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Quote a name with backticks unless it is a plain identifier.
 */
export function escapeName(name: string): string {
  return IDENTIFIER.test(name) ? name : `\`${name.replace(/`/g, '``')}\``
}

function quoteString(value: string, quote: QuoteStyle): string {
  if (quote === '"') {
    return JSON.stringify(value)
  }
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function serializeEntries(entries: Iterable<[string, unknown]>, options: SerializeOptions): string {
  const parts: string[] = []
  for (const [key, entry] of entries) {
    if (entry === undefined) continue
    parts.push(`${escapeName(key)}: ${serialize(entry, options)}`)
  }
  return `{${parts.join(', ')}}`
}

/**
 * Serialize a value into a Cypher literal.
 *
 * @throws SerializationError for values with no literal form
 */
export function serialize(value: unknown, options: SerializeOptions = {}): string {
  const quote = options.quote ?? "'"

  if (value === null) return 'null'

  switch (typeof value) {
    case 'string':
      return RAW_LITERALS.has(value.toLowerCase()) ? value : quoteString(value, quote)
    case 'boolean':
      return String(value)
    case 'bigint':
      return value.toString()
    case 'number':
      if (!Number.isFinite(value)) {
        throw new SerializationError(`${value} has no Cypher literal form`, value)
      }
      return String(value)
    case 'object':
      break
    default:
      throw new SerializationError(`Unsupported value of type ${typeof value}`, value)
  }

  if (value instanceof PropertyVariable) return value.name
  if (value instanceof TemporalValue) return value.toCypher()
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new SerializationError('Invalid Date has no Cypher literal form', value)
    }
    return TemporalValue.fromDate(value).toCypher()
  }
  if (isInt(value)) return value.toString()

  const temporal = fromDriverTemporal(value)
  if (temporal) return temporal.toCypher()

  if (Array.isArray(value) || value instanceof Set) {
    return `[${Array.from(value, (item: unknown) => serialize(item, options)).join(', ')}]`
  }
  if (value instanceof Map) {
    const entries: Array<[string, unknown]> = []
    for (const [key, entry] of value.entries()) {
      if (typeof key !== 'string') {
        throw new SerializationError('Map keys must be strings', key)
      }
      entries.push([key, entry])
    }
    return serializeEntries(entries, options)
  }
  if (isPlainObject(value)) {
    return serializeEntries(Object.entries(value), options)
  }

  throw new SerializationError(`Unsupported value of type ${value.constructor.name}`, value)
}

/**
 * Render labels as `:A:B`. Empty input renders nothing.
 */
export function toCypherLabels(labels: string | Iterable<string> | null | undefined): string {
  if (!labels) return ''
  const list = typeof labels === 'string' ? [labels] : Array.from(labels)
  return list
    .filter((label) => label.length > 0)
    .map((label) => `:${escapeName(label)}`)
    .join('')
}

/**
 * Render a pattern property map. Strings are double-quoted.
 *
 * @example
 * toCypherProperties({ name: 'Ron' }) // '{name: "Ron"}'
 */
export function toCypherProperties(properties: Record<string, unknown> | null | undefined): string {
  if (!properties) return ''
  const defined = Object.entries(properties).filter(([, value]) => value !== undefined)
  if (defined.length === 0) return ''
  return serializeEntries(defined, { quote: '"' })
}

export type ProcedureArgument = string | number | bigint | boolean | null

/**
 * Render procedure-call arguments. A single string is taken as argument text
 * and written as-is; in a list, strings are double-quoted and every other
 * argument is written as-is.
 *
 * @example
 * toCypherProcedureArguments('n, 10')      // 'n, 10'
 * toCypherProcedureArguments(['Ron', 10])  // '"Ron", 10'
 */
export function toCypherProcedureArguments(
  args: ProcedureArgument | ProcedureArgument[] | undefined,
): string {
  if (args === undefined || args === null) return ''
  if (typeof args === 'string') return args
  if (!Array.isArray(args)) return String(args)
  return args.map((arg: ProcedureArgument) => (typeof arg === 'string' ? JSON.stringify(arg) : String(arg))).join(', ')
}
