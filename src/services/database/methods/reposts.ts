import type { RepostRecord } from '@root/types/reposts.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { Knex } from 'knex'

export interface PersonalRepostRow {
  user_pubkey: string
  addressable_id: string
  repost_event_id: string
  original_author_pubkey: string
  created_at: number
}

const TABLE = 'personal_reposts'

/** SQLite caps bound parameters per statement; 5 columns per row */
const UPSERT_CHUNK_SIZE = 100

function toRow(userPubkey: string, record: RepostRecord): PersonalRepostRow {
  return {
    user_pubkey: userPubkey,
    addressable_id: record.addressableId,
    repost_event_id: record.repostEventId,
    original_author_pubkey: record.originalAuthorPubkey,
    created_at: record.createdAt,
  }
}

function toRecord(row: PersonalRepostRow): RepostRecord {
  return {
    addressableId: row.addressable_id,
    repostEventId: row.repost_event_id,
    originalAuthorPubkey: row.original_author_pubkey,
    createdAt: Number(row.created_at),
  }
}

/**
 * Inserts or replaces the repost record for a user's addressable ID.
 */
export async function upsertPersonalRepost(
  this: DatabaseService,
  userPubkey: string,
  record: RepostRecord,
  trx?: Knex.Transaction,
): Promise<void> {
  const query: Knex = trx ?? this.knex
  await query<PersonalRepostRow>(TABLE)
    .insert(toRow(userPubkey, record))
    .onConflict(['user_pubkey', 'addressable_id'])
    .merge(['repost_event_id', 'original_author_pubkey', 'created_at'])
}

/**
 * Inserts or replaces many repost records in a single transaction.
 */
export async function upsertPersonalRepostsBatch(
  this: DatabaseService,
  userPubkey: string,
  records: readonly RepostRecord[],
): Promise<void> {
  if (records.length === 0) return

  await this.knex.transaction(async (trx) => {
    for (let i = 0; i < records.length; i += UPSERT_CHUNK_SIZE) {
      const rows = records
        .slice(i, i + UPSERT_CHUNK_SIZE)
        .map((record) => toRow(userPubkey, record))
      await trx<PersonalRepostRow>(TABLE)
        .insert(rows)
        .onConflict(['user_pubkey', 'addressable_id'])
        .merge(['repost_event_id', 'original_author_pubkey', 'created_at'])
    }
  })

  this.log.debug(
    { userPubkey, count: records.length },
    'Upserted personal repost batch',
  )
}

/**
 * Deletes a user's repost record.
 *
 * @returns true when a row was removed
 */
export async function deletePersonalRepost(
  this: DatabaseService,
  userPubkey: string,
  addressableId: string,
): Promise<boolean> {
  const deleted = await this.knex<PersonalRepostRow>(TABLE)
    .where({ user_pubkey: userPubkey, addressable_id: addressableId })
    .delete()
  return deleted > 0
}

export async function getPersonalRepost(
  this: DatabaseService,
  userPubkey: string,
  addressableId: string,
): Promise<RepostRecord | null> {
  const row = await this.knex<PersonalRepostRow>(TABLE)
    .where({ user_pubkey: userPubkey, addressable_id: addressableId })
    .first()
  return row ? toRecord(row) : null
}

export async function getPersonalRepostEventId(
  this: DatabaseService,
  userPubkey: string,
  addressableId: string,
): Promise<string | null> {
  const row = await this.knex<PersonalRepostRow>(TABLE)
    .select('repost_event_id')
    .where({ user_pubkey: userPubkey, addressable_id: addressableId })
    .first()
  return row?.repost_event_id ?? null
}

/**
 * Returns all of a user's repost records, most recent first.
 */
export async function getAllPersonalReposts(
  this: DatabaseService,
  userPubkey: string,
): Promise<RepostRecord[]> {
  const rows = await this.knex<PersonalRepostRow>(TABLE)
    .where({ user_pubkey: userPubkey })
    .orderBy('created_at', 'desc')
  return rows.map(toRecord)
}

export async function getPersonalRepostAddressableIds(
  this: DatabaseService,
  userPubkey: string,
): Promise<Set<string>> {
  const rows = await this.knex<PersonalRepostRow>(TABLE)
    .select('addressable_id')
    .where({ user_pubkey: userPubkey })
  return new Set(rows.map((row) => row.addressable_id))
}

export async function isPersonallyReposted(
  this: DatabaseService,
  userPubkey: string,
  addressableId: string,
): Promise<boolean> {
  const row = await this.knex<PersonalRepostRow>(TABLE)
    .select('addressable_id')
    .where({ user_pubkey: userPubkey, addressable_id: addressableId })
    .first()
  return row !== undefined
}

/**
 * Removes every repost record belonging to a user.
 *
 * @returns Number of rows removed
 */
export async function clearPersonalReposts(
  this: DatabaseService,
  userPubkey: string,
): Promise<number> {
  const deleted = await this.knex<PersonalRepostRow>(TABLE)
    .where({ user_pubkey: userPubkey })
    .delete()

  this.log.debug({ userPubkey, deleted }, 'Cleared personal reposts')
  return deleted
}
