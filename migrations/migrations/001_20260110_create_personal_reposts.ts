import type { Knex } from 'knex'

/**
 * Creates the `personal_reposts` table holding the local user's repost records.
 *
 * One row per (user, addressable ID); `created_at` is the repost event's unix
 * timestamp in seconds.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('personal_reposts', (table) => {
    table.string('user_pubkey').notNullable()
    table.string('addressable_id').notNullable()
    table.string('repost_event_id').notNullable()
    table.string('original_author_pubkey').notNullable()
    table.integer('created_at').notNullable()
    table.primary(['user_pubkey', 'addressable_id'])
    table.index(['user_pubkey', 'created_at'])
  })
}

/**
 * Drops the `personal_reposts` table.
 */
export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('personal_reposts')
}
