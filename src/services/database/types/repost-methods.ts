import type { RepostRecord } from '@root/types/reposts.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // PERSONAL REPOSTS
    /**
     * Inserts or replaces the repost record for a user's addressable ID
     * @param userPubkey - Owner of the record
     * @param record - Record to store
     * @param trx - Optional transaction
     */
    upsertPersonalRepost(
      this: DatabaseService,
      userPubkey: string,
      record: RepostRecord,
      trx?: Knex.Transaction,
    ): Promise<void>

    /**
     * Inserts or replaces many repost records in one transaction
     */
    upsertPersonalRepostsBatch(
      this: DatabaseService,
      userPubkey: string,
      records: readonly RepostRecord[],
    ): Promise<void>

    /**
     * Deletes a user's repost record
     * @returns Promise resolving to true when a row was removed
     */
    deletePersonalRepost(
      this: DatabaseService,
      userPubkey: string,
      addressableId: string,
    ): Promise<boolean>

    /**
     * Retrieves a user's repost record
     * @returns Promise resolving to the record, or null if not reposted
     */
    getPersonalRepost(
      this: DatabaseService,
      userPubkey: string,
      addressableId: string,
    ): Promise<RepostRecord | null>

    /**
     * Retrieves only the repost event ID for a user's addressable ID
     */
    getPersonalRepostEventId(
      this: DatabaseService,
      userPubkey: string,
      addressableId: string,
    ): Promise<string | null>

    /**
     * Retrieves all of a user's repost records, most recent first
     */
    getAllPersonalReposts(
      this: DatabaseService,
      userPubkey: string,
    ): Promise<RepostRecord[]>

    /**
     * Retrieves the set of addressable IDs a user has reposted
     */
    getPersonalRepostAddressableIds(
      this: DatabaseService,
      userPubkey: string,
    ): Promise<Set<string>>

    /**
     * Checks whether a user has a repost record for an addressable ID
     */
    isPersonallyReposted(
      this: DatabaseService,
      userPubkey: string,
      addressableId: string,
    ): Promise<boolean>

    /**
     * Removes every repost record belonging to a user
     * @returns Promise resolving to the number of rows removed
     */
    clearPersonalReposts(
      this: DatabaseService,
      userPubkey: string,
    ): Promise<number>
  }
}
