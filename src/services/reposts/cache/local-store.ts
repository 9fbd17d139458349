/**
 * Local Store
 *
 * Database-backed repost cache scoped to a single user pubkey.
 */

import type {
  RepostedIdsListener,
  RepostRecord,
  RepostsLocalStore,
  Unsubscribe,
} from '@root/types/reposts.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { RepostedIdsChannel } from './reposted-ids-channel.js'

export class DbRepostsLocalStore implements RepostsLocalStore {
  private readonly watchers = new RepostedIdsChannel()

  constructor(
    private readonly db: DatabaseService,
    private readonly userPubkey: string,
    private readonly log: FastifyBaseLogger,
  ) {}

  async upsert(record: RepostRecord): Promise<void> {
    await this.db.upsertPersonalRepost(this.userPubkey, record)
    await this.notifyWatchers()
  }

  async upsertBatch(records: readonly RepostRecord[]): Promise<void> {
    if (records.length === 0) return
    await this.db.upsertPersonalRepostsBatch(this.userPubkey, records)
    await this.notifyWatchers()
  }

  async delete(addressableId: string): Promise<boolean> {
    const removed = await this.db.deletePersonalRepost(
      this.userPubkey,
      addressableId,
    )
    if (removed) {
      await this.notifyWatchers()
    }
    return removed
  }

  get(addressableId: string): Promise<RepostRecord | null> {
    return this.db.getPersonalRepost(this.userPubkey, addressableId)
  }

  getEventId(addressableId: string): Promise<string | null> {
    return this.db.getPersonalRepostEventId(this.userPubkey, addressableId)
  }

  getAll(): Promise<RepostRecord[]> {
    return this.db.getAllPersonalReposts(this.userPubkey)
  }

  getAllAddressableIds(): Promise<Set<string>> {
    return this.db.getPersonalRepostAddressableIds(this.userPubkey)
  }

  contains(addressableId: string): Promise<boolean> {
    return this.db.isPersonallyReposted(this.userPubkey, addressableId)
  }

  /**
   * Emits the stored set once it has been read, then after every write.
   */
  watchAllAddressableIds(listener: RepostedIdsListener): Unsubscribe {
    let active = true
    let unsubscribe: Unsubscribe = () => {}

    this.getAllAddressableIds()
      .then((addressableIds) => {
        if (!active) return
        this.watchers.publish(addressableIds)
        unsubscribe = this.watchers.subscribe(listener)
      })
      .catch((error) => {
        this.log.warn(
          { error, userPubkey: this.userPubkey },
          'Failed to read reposted addressable IDs for watcher',
        )
      })

    return () => {
      active = false
      unsubscribe()
    }
  }

  async clearAllForUser(): Promise<void> {
    await this.db.clearPersonalReposts(this.userPubkey)
    await this.notifyWatchers()
  }

  private async notifyWatchers(): Promise<void> {
    if (this.watchers.listenerCount() === 0) return

    try {
      this.watchers.publish(await this.getAllAddressableIds())
    } catch (error) {
      this.log.warn(
        { error, userPubkey: this.userPubkey },
        'Failed to refresh reposted addressable IDs for watchers',
      )
    }
  }
}
