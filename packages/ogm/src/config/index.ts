/**
 * Connection Configuration
 *
 * Validated connection settings, given directly or read from the
 * environment.
 */

import { z } from 'zod'
import { ValidationError } from '../errors'
import type { Vendor } from '../executor/provider'

// =============================================================================
// SCHEMA
// =============================================================================

export const PoolConfigSchema = z.object({
  maxSize: z.number().int().positive().optional(),
  /** Milliseconds to wait for a free connection */
  acquisitionTimeout: z.number().int().positive().optional(),
})

export const ConnectionConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(7687),
  username: z.string().default(''),
  password: z.string().default(''),
  encrypted: z.boolean().default(false),
  /** Neo4j database name; Memgraph has one database */
  database: z.string().min(1).optional(),
  clientName: z.string().min(1).default('cypher-ogm'),
  pool: PoolConfigSchema.optional(),
})

export type ConnectionConfig = z.output<typeof ConnectionConfigSchema>
export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

/**
 * Validate connection settings and fill in the defaults.
 */
export function parseConnectionConfig(input: ConnectionConfigInput = {}): ConnectionConfig {
  const result = ConnectionConfigSchema.safeParse(input)
  if (!result.success) {
    const [issue] = result.error.issues
    throw new ValidationError(
      `Invalid connection config: ${issue ? describeIssue(issue) : result.error.message}`,
      issue?.path.join('.'),
    )
  }
  return result.data
}

/** The Bolt URI of a config */
export function boltUri(config: ConnectionConfig): string {
  return `bolt://${config.host}:${config.port}`
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

interface VendorEnvironment {
  prefix: string
  defaults: ConnectionConfigInput
  database: boolean
}

const ENVIRONMENTS: Record<Vendor, VendorEnvironment> = {
  memgraph: { prefix: 'MEMGRAPH', defaults: { username: '', password: '' }, database: false },
  neo4j: { prefix: 'NEO4J', defaults: { username: 'neo4j', password: 'test' }, database: true },
}

const ENV_FIELDS = ['host', 'port', 'username', 'password', 'encrypted', 'database'] as const

type EnvField = (typeof ENV_FIELDS)[number]

function parseFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') return true
  if (normalized === 'false' || normalized === '0') return false
  throw new ValidationError(`${name} must be true or false, got '${value}'`, name, 'boolean', value)
}

/**
 * Read connection settings for a vendor from `MEMGRAPH_*` or `NEO4J_*`
 * variables (`HOST`, `PORT`, `USERNAME`, `PASSWORD`, `ENCRYPTED`, and
 * `DATABASE` for Neo4j).
 *
 * @throws ValidationError naming the offending variable
 */
export function loadConnectionConfig(vendor: Vendor, env: NodeJS.ProcessEnv = process.env): ConnectionConfig {
  const { prefix, defaults, database } = ENVIRONMENTS[vendor]
  const variable = (field: EnvField): string => `${prefix}_${field.toUpperCase()}`
  const read = (field: EnvField): string | undefined => {
    const value = env[variable(field)]
    return value === undefined || value === '' ? undefined : value
  }

  const port = read('port')
  const encrypted = read('encrypted')
  const input: ConnectionConfigInput = {
    ...defaults,
    host: read('host'),
    port: port === undefined ? undefined : Number(port),
    username: read('username') ?? defaults.username,
    password: read('password') ?? defaults.password,
    encrypted: encrypted === undefined ? undefined : parseFlag(variable('encrypted'), encrypted),
    database: database ? read('database') : undefined,
  }

  const result = ConnectionConfigSchema.safeParse(input)
  if (!result.success) {
    const [issue] = result.error.issues
    const field = ENV_FIELDS.find((name) => name === issue?.path[0])
    const name = field ? variable(field) : prefix
    throw new ValidationError(
      `Invalid ${name}: ${issue?.message ?? result.error.message}`,
      name,
      undefined,
      field ? env[name] : undefined,
    )
  }
  return result.data
}
