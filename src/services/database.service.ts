/**
 * Database Service
 *
 * Provides the primary interface to the application's better-sqlite3 database.
 * Exposed to the application via the 'database' Fastify plugin as `fastify.db`.
 *
 * Responsible for:
 * - Per-user personal repost records (the durable layer of the repost cache)
 *
 * Query methods live in `./database/methods/*` and are declared on the class
 * through the module augmentations in `./database/types/*`.
 *
 * @example
 * const records = await fastify.db.getAllPersonalReposts(userPubkey)
 */
import fs from 'node:fs'
import { dirname } from 'node:path'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import knex, { type Knex } from 'knex'
import * as repostMethods from './database/methods/reposts.js'
import './database/types/repost-methods.js'

export class DatabaseService {
  readonly knex: Knex

  /**
   * Creates a new DatabaseService instance
   *
   * @param log - Fastify logger instance for recording database operations
   * @param dbPath - Path to the SQLite database file
   */
  constructor(
    readonly log: FastifyBaseLogger,
    dbPath: string,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(dbPath, log))
  }

  /**
   * Creates the service for the configured database path, creating the
   * parent directory when it does not exist yet.
   */
  static async create(
    log: FastifyBaseLogger,
    fastify: FastifyInstance,
  ): Promise<DatabaseService> {
    const dbPath = fastify.config.dbPath
    if (dbPath !== ':memory:') {
      await fs.promises.mkdir(dirname(dbPath), { recursive: true })
    }
    return new DatabaseService(log, dbPath)
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * A single pooled connection keeps SQLite writes serialized.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Closes the database connection
   *
   * Should be called during application shutdown to properly clean up resources.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }
}

Object.assign(DatabaseService.prototype, repostMethods)
