/**
 * Connection Manager
 *
 * Bolt driver lifecycle for Memgraph and Neo4j. The driver is created on
 * first use; every query runs in its own write session.
 */

import neo4j, { type Config, type Driver, type Record as Neo4jRecord, type Session } from 'neo4j-driver'
import { boltUri, type ConnectionConfig } from '../config'

/**
 * What a database client needs from a connection.
 */
export interface BoltConnection {
  /** Stream the records of a query */
  stream(query: string, parameters: Record<string, unknown>): AsyncGenerator<Neo4jRecord, void, undefined>

  /** Run a query and discard its records */
  run(query: string, parameters: Record<string, unknown>): Promise<void>

  close(): Promise<void>
}

/**
 * Manages the driver of one database.
 */
export class ConnectionManager implements BoltConnection {
  private readonly config: ConnectionConfig
  private driver: Driver | null = null

  constructor(config: ConnectionConfig) {
    this.config = config
  }

  get uri(): string {
    return boltUri(this.config)
  }

  /** Create the driver and check that the server answers */
  async connect(): Promise<void> {
    await this.getDriver().verifyConnectivity()
  }

  async close(): Promise<void> {
    if (this.driver) {
      await this.driver.close()
      this.driver = null
    }
  }

  async isConnected(): Promise<boolean> {
    if (!this.driver) return false

    try {
      await this.driver.verifyConnectivity()
      return true
    } catch {
      return false
    }
  }

  async *stream(query: string, parameters: Record<string, unknown>): AsyncGenerator<Neo4jRecord, void, undefined> {
    const session = this.getSession()

    try {
      for await (const record of session.run(query, parameters)) {
        yield record
      }
    } finally {
      await session.close()
    }
  }

  async run(query: string, parameters: Record<string, unknown>): Promise<void> {
    const session = this.getSession()

    try {
      await session.run(query, parameters)
    } finally {
      await session.close()
    }
  }

  private getSession(): Session {
    return this.getDriver().session({
      database: this.config.database,
      defaultAccessMode: neo4j.session.WRITE,
    })
  }

  private getDriver(): Driver {
    if (this.driver) return this.driver

    const driverConfig: Config = {
      encrypted: this.config.encrypted,
      userAgent: this.config.clientName,
    }
    if (this.config.pool?.maxSize) {
      driverConfig.maxConnectionPoolSize = this.config.pool.maxSize
    }
    if (this.config.pool?.acquisitionTimeout) {
      driverConfig.connectionAcquisitionTimeout = this.config.pool.acquisitionTimeout
    }

    this.driver = neo4j.driver(
      this.uri,
      neo4j.auth.basic(this.config.username, this.config.password),
      driverConfig,
    )
    return this.driver
  }
}
