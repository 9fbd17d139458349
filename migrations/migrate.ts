import knex from 'knex'
import config from './knexfile.js'

/**
 * Runs the latest database migrations using the development configuration.
 *
 * Ensures the database connection is closed regardless of success or failure.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    await db.migrate.latest()
    console.log('Migrations completed successfully')
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

await migrate()
