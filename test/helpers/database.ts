import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { Knex } from 'knex'
import knex from 'knex'

let anchorConnection: Knex | null = null

export const TEST_DB_PREFIX = 'repost-sync-test-'

export const TEST_DB_PATH = path.join(
  os.tmpdir(),
  `${TEST_DB_PREFIX}${process.pid}.db`,
)

interface SqliteConnection {
  exec(sql: string): void
}

/**
 * Initialize the test database connection and run migrations
 * Uses a temp file per process so the app under test can open it too
 */
export async function initializeTestDatabase(): Promise<Knex> {
  if (anchorConnection) {
    return anchorConnection
  }

  anchorConnection = knex({
    client: 'better-sqlite3',
    connection: {
      filename: TEST_DB_PATH,
    },
    useNullAsDefault: true,
    migrations: {
      directory: './migrations/migrations',
    },
    pool: {
      min: 1,
      max: 1,
      afterCreate: (conn: SqliteConnection, cb: () => void): void => {
        conn.exec('PRAGMA foreign_keys = ON;')
        cb()
      },
    },
  })

  await anchorConnection.migrate.latest()

  return anchorConnection
}

/**
 * Get the current test database connection
 * Throws if database has not been initialized
 */
export function getTestDatabase(): Knex {
  if (!anchorConnection) {
    throw new Error('Database connection not initialized')
  }
  return anchorConnection
}

/**
 * Reset database by truncating all tables except migrations
 * Call this in beforeEach hooks to ensure clean state between tests
 */
export async function resetDatabase(): Promise<void> {
  if (!anchorConnection) {
    throw new Error('Database connection not initialized')
  }

  const rows = await anchorConnection('sqlite_master')
    .select<{ name: string }[]>('name')
    .where('type', 'table')
    .whereNot('name', 'like', 'knex_%')
    .whereNot('name', 'like', 'sqlite_%')

  for (const { name } of rows) {
    await anchorConnection(name).del()
  }
}

/**
 * Closes the anchor connection of the current worker
 */
export async function closeTestDatabase(): Promise<void> {
  if (anchorConnection) {
    await anchorConnection.destroy()
    anchorConnection = null
  }
}

/**
 * Removes every worker's temp database file
 * Called from global teardown, which runs in a different process than the workers
 */
export async function cleanupTestDatabase(): Promise<void> {
  await closeTestDatabase()

  const tmpDir = os.tmpdir()
  const files = await fs.promises.readdir(tmpDir)
  for (const file of files) {
    if (file.startsWith(TEST_DB_PREFIX)) {
      await fs.promises.rm(path.join(tmpDir, file), { force: true })
    }
  }
}
