import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import dotenv from 'dotenv'
import type { Knex } from 'knex'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..')

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbDirectory(dbPath: string): string {
  const dbDirectory = dirname(dbPath)
  try {
    if (!fs.existsSync(dbDirectory)) {
      fs.mkdirSync(dbDirectory, { recursive: true })
    }
    return dbPath
  } catch (err) {
    console.error('Failed to create database directory:', err)
    process.exit(1)
  }
}

const getSqliteConnection = () => ({
  filename: ensureDbDirectory(
    process.env.dbPath || resolve(projectRoot, 'data', 'db', 'repost-sync.db'),
  ),
})

interface SqliteConnection {
  exec: (sql: string) => void
}

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'better-sqlite3',
    connection: getSqliteConnection(),
    useNullAsDefault: true,
    migrations: {
      directory: resolve(__dirname, 'migrations'),
    },
    pool: {
      afterCreate: (conn: SqliteConnection, cb: () => void) => {
        conn.exec('PRAGMA journal_mode = WAL;')
        cb()
      },
    },
  },
}

export default config
