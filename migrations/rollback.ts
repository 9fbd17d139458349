import knex from 'knex'
import config from './knexfile.js'

/**
 * Rolls back the latest database migration using the development configuration.
 */
async function rollback() {
  const db = knex(config.development)

  try {
    await db.migrate.rollback()
    console.log('Migration rolled back successfully')
  } catch (err) {
    console.error('Error rolling back migration:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await rollback()
