/**
 * Reposts Service
 *
 * Keeps the local user's reposts consistent across the relay network and the
 * local cache. The in-memory index is the working copy, the local store makes
 * it survive restarts, and the relays are the source of truth that sync
 * reconciles against.
 *
 * Relay queries, merging and tag parsing live in `./reposts/*`.
 */

import {
  type EventGateway,
  EventKind,
  type NostrEvent,
} from '@root/types/event-gateway.types.js'
import {
  AlreadyRepostedError,
  describeError,
  NotRepostedError,
  RepostFailedError,
  SyncFailedError,
  UnrepostFailedError,
} from '@root/types/errors.js'
import type {
  AuthStateSource,
  RepostedIdsListener,
  RepostParams,
  RepostRecord,
  RepostsLocalStore,
  RepostsSyncResult,
  Unsubscribe,
} from '@root/types/reposts.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { RepostedIdsChannel } from './reposts/cache/index.js'
import {
  fetchUserRepostRecords,
  fetchUserReposts,
  getRepostCount,
  getRepostCountByEventId,
  getReposters,
  queryRepostEvents,
  type RepostCountsDeps,
  type UserRepostsDeps,
} from './reposts/fetching/index.js'
import {
  buildSyncResult,
  mergeIncomingRecords,
  sortByRecency,
} from './reposts/sync/index.js'
import { recordFromEvent } from './reposts/utils/index.js'

export const DEFAULT_REPOST_FETCH_LIMIT = 500

export interface RepostsServiceDeps {
  gateway: EventGateway
  userPubkey: string
  /** Durable cache; without one the index lives only in memory */
  localStore?: RepostsLocalStore | null
  authState?: AuthStateSource | null
}

export interface RepostsServiceConfig {
  /** Maximum events requested per relay query */
  fetchLimit: number
  /** Kind of the content being reposted, written as the `k` tag */
  targetKind: number
}

export class RepostsService {
  private readonly log: FastifyBaseLogger
  private readonly _config: RepostsServiceConfig
  private readonly _index = new Map<string, RepostRecord>()
  private readonly repostedIds = new RepostedIdsChannel()
  private readonly unsubscribeAuth: Unsubscribe | null
  private _isInitialized = false
  private _isAuthenticated: boolean

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: RepostsServiceDeps,
    config?: Partial<RepostsServiceConfig>,
  ) {
    this.log = createServiceLogger(baseLog, 'REPOSTS')
    this._config = {
      fetchLimit: config?.fetchLimit ?? DEFAULT_REPOST_FETCH_LIMIT,
      targetKind: config?.targetKind ?? EventKind.VIDEO_VERTICAL,
    }

    this._isAuthenticated = deps.authState?.isAuthenticated ?? false
    this.unsubscribeAuth = deps.authState
      ? deps.authState.subscribe((isAuthenticated) =>
          this.handleAuthChange(isAuthenticated),
        )
      : null
  }

  // ============================================================================
  // Getters
  // ============================================================================

  get config(): RepostsServiceConfig {
    return this._config
  }

  get isInitialized(): boolean {
    return this._isInitialized
  }

  get isAuthenticated(): boolean {
    return this._isAuthenticated
  }

  get userPubkey(): string {
    return this.deps.userPubkey
  }

  // ============================================================================
  // Dependencies
  // ============================================================================

  private get userRepostsDeps(): UserRepostsDeps {
    return {
      gateway: this.deps.gateway,
      logger: this.log,
      fetchLimit: this._config.fetchLimit,
    }
  }

  private get repostCountsDeps(): RepostCountsDeps {
    return { gateway: this.deps.gateway }
  }

  private get store(): RepostsLocalStore | null {
    return this.deps.localStore ?? null
  }

  // ============================================================================
  // Status
  // ============================================================================

  async isReposted(addressableId: string): Promise<boolean> {
    await this.ensureInitialized()
    return this._index.has(addressableId)
  }

  /**
   * Memory-only check for render paths. Returns false until the index has
   * been seeded.
   */
  isRepostedSync(addressableId: string): boolean {
    return this._index.has(addressableId)
  }

  async getRepostedAddressableIds(): Promise<Set<string>> {
    await this.ensureInitialized()
    return new Set(this._index.keys())
  }

  async getOrderedRepostedAddressableIds(): Promise<string[]> {
    await this.ensureInitialized()
    return sortByRecency(this._index.values()).map(
      (record) => record.addressableId,
    )
  }

  async getRepostRecord(addressableId: string): Promise<RepostRecord | null> {
    await this.ensureInitialized()
    return this._index.get(addressableId) ?? null
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  /**
   * Publishes a generic repost of addressable content.
   *
   * @returns ID of the published repost event
   * @throws AlreadyRepostedError when the content is already reposted
   * @throws RepostFailedError when no relay accepted the event
   */
  async repostVideo(params: RepostParams): Promise<string> {
    const { addressableId, originalAuthorPubkey, eventId } = params
    await this.ensureInitialized()

    if (this._index.has(addressableId)) {
      throw new AlreadyRepostedError(addressableId)
    }

    let sentEvent: NostrEvent | null
    try {
      sentEvent = await this.deps.gateway.publishRepostAssertion(
        addressableId,
        this._config.targetKind,
        originalAuthorPubkey,
        eventId,
      )
    } catch (error) {
      this.log.error({ error, addressableId }, 'Error publishing repost')
      throw new RepostFailedError(
        `Failed to publish repost: ${describeError(error)}`,
      )
    }

    if (!sentEvent?.id) {
      throw new RepostFailedError('Failed to publish repost to relays')
    }

    const record: RepostRecord = {
      addressableId,
      repostEventId: sentEvent.id,
      originalAuthorPubkey,
      createdAt: sentEvent.created_at,
    }
    this._index.set(addressableId, record)

    const store = this.store
    if (store) {
      await this.persistBestEffort('upsert', addressableId, () =>
        store.upsert(record),
      )
    }
    this.broadcast()

    this.log.debug(
      { addressableId, repostEventId: sentEvent.id },
      'Reposted content',
    )
    return sentEvent.id
  }

  /**
   * Retracts the local user's repost of addressable content.
   *
   * @throws NotRepostedError when no repost record exists
   * @throws UnrepostFailedError when no relay accepted the deletion
   */
  async unrepostVideo(addressableId: string): Promise<void> {
    await this.ensureInitialized()

    const record = await this.findRecord(addressableId)
    if (!record) {
      throw new NotRepostedError(addressableId)
    }

    let deletionEvent: NostrEvent | null
    try {
      deletionEvent = await this.deps.gateway.publishRetraction(
        record.repostEventId,
      )
    } catch (error) {
      this.log.error({ error, addressableId }, 'Error publishing unrepost')
      throw new UnrepostFailedError(
        `Failed to publish unrepost deletion: ${describeError(error)}`,
      )
    }

    if (!deletionEvent) {
      throw new UnrepostFailedError('Failed to publish unrepost deletion')
    }

    this._index.delete(addressableId)

    const store = this.store
    if (store) {
      await this.persistBestEffort('delete', addressableId, () =>
        store.delete(addressableId),
      )
    }
    this.broadcast()

    this.log.debug(
      { addressableId, deletionEventId: deletionEvent.id },
      'Unreposted content',
    )
  }

  /**
   * Reposts or unreposts depending on the current state.
   *
   * Not atomic: two overlapping toggles of the same content can both observe
   * the same state, and the second then fails its precondition.
   *
   * @returns true when the content is now reposted
   */
  async toggleRepost(params: RepostParams): Promise<boolean> {
    await this.ensureInitialized()

    if (await this.readRepostStatus(params.addressableId)) {
      await this.unrepostVideo(params.addressableId)
      return false
    }

    await this.repostVideo(params)
    return true
  }

  // ============================================================================
  // Sync
  // ============================================================================

  /**
   * Reconciles the index with the local user's reposts on the relays.
   *
   * Loads the local store first so cached reposts are visible immediately,
   * then merges relay records that are newer than what is cached. When the
   * relays cannot be reached, the cached result is returned if there is one.
   *
   * @throws SyncFailedError when the relays fail and nothing is cached
   */
  async syncUserReposts(): Promise<RepostsSyncResult> {
    await this.loadFromStore()

    let events: NostrEvent[]
    try {
      events = await queryRepostEvents(
        this.deps.userPubkey,
        this.userRepostsDeps,
      )
    } catch (error) {
      if (this._index.size > 0) {
        this.log.warn(
          { error, cached: this._index.size },
          'Relay sync failed, using cached reposts',
        )
        this._isInitialized = true
        return buildSyncResult(this._index)
      }
      this.log.error({ error }, 'Relay sync failed with no cached reposts')
      throw new SyncFailedError(
        `Failed to sync user reposts: ${describeError(error)}`,
      )
    }

    const incoming: RepostRecord[] = []
    for (const event of events) {
      const record = recordFromEvent(event)
      if (record) incoming.push(record)
    }
    if (incoming.length < events.length) {
      this.log.debug(
        { skipped: events.length - incoming.length },
        'Skipped repost events without a usable a or p tag',
      )
    }

    const changed = mergeIncomingRecords(this._index, incoming)
    const store = this.store
    if (store && changed.length > 0) {
      await this.persistBestEffort('upsertBatch', null, () =>
        store.upsertBatch(changed),
      )
    }

    this.broadcast()
    this._isInitialized = true

    this.log.info(
      {
        fetched: events.length,
        changed: changed.length,
        total: this._index.size,
      },
      'Synced user reposts',
    )
    return buildSyncResult(this._index)
  }

  // ============================================================================
  // Read-through Queries
  // ============================================================================

  fetchUserReposts(pubkey: string): Promise<string[]> {
    return fetchUserReposts(pubkey, this.userRepostsDeps)
  }

  fetchUserRepostRecords(pubkey: string): Promise<RepostRecord[]> {
    return fetchUserRepostRecords(pubkey, this.userRepostsDeps)
  }

  getRepostCount(addressableId: string): Promise<number> {
    return getRepostCount(addressableId, this.repostCountsDeps)
  }

  getRepostCountByEventId(eventId: string): Promise<number> {
    return getRepostCountByEventId(eventId, this.repostCountsDeps)
  }

  getReposters(eventId: string): Promise<string[]> {
    return getReposters(eventId, this.repostCountsDeps)
  }

  // ============================================================================
  // Cache & Lifecycle
  // ============================================================================

  /**
   * Forgets every local repost record. Relays are not touched.
   */
  async clearCache(): Promise<void> {
    this._index.clear()
    try {
      await this.store?.clearAllForUser()
    } finally {
      this.broadcast()
      this._isInitialized = false
    }
  }

  /**
   * Subscribes to the set of reposted addressable IDs. The listener receives
   * the current set first.
   */
  watchRepostedAddressableIds(listener: RepostedIdsListener): Unsubscribe {
    const store = this.store
    if (store) {
      return store.watchAllAddressableIds(listener)
    }
    return this.repostedIds.subscribe(listener)
  }

  /**
   * Snapshot last broadcast to subscribers.
   */
  get currentRepostedIds(): ReadonlySet<string> {
    return this.repostedIds.value
  }

  /**
   * Async stream of the last broadcast set followed by every new one, for
   * long-lived consumers such as the SSE route.
   */
  streamRepostedAddressableIds(
    signal?: AbortSignal,
  ): AsyncGenerator<ReadonlySet<string>> {
    return this.repostedIds.stream(signal)
  }

  dispose(): void {
    this.unsubscribeAuth?.()
    this.repostedIds.close()
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * Seeds the index from the local store once. Never contacts the relays.
   */
  private async ensureInitialized(): Promise<void> {
    if (this._isInitialized) return

    const store = this.store
    if (store) {
      const records = await store.getAll()
      for (const record of records) {
        this._index.set(record.addressableId, record)
      }
      this.broadcast()
    }
    this._isInitialized = true
  }

  private async loadFromStore(): Promise<void> {
    const store = this.store
    if (!store) return

    try {
      const records = await store.getAll()
      for (const record of records) {
        this._index.set(record.addressableId, record)
      }
      this.broadcast()
    } catch (error) {
      this.log.warn({ error }, 'Failed to load cached reposts before sync')
    }
  }

  private async findRecord(
    addressableId: string,
  ): Promise<RepostRecord | null> {
    const cached = this._index.get(addressableId)
    if (cached) return cached
    return (await this.store?.get(addressableId)) ?? null
  }

  private async readRepostStatus(addressableId: string): Promise<boolean> {
    const store = this.store
    if (!store) return this._index.has(addressableId)

    try {
      return await store.contains(addressableId)
    } catch (error) {
      this.log.warn(
        { error, addressableId },
        'Failed to read repost status from store, using in-memory index',
      )
      return this._index.has(addressableId)
    }
  }

  private async persistBestEffort(
    operation: string,
    addressableId: string | null,
    write: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await write()
    } catch (error) {
      this.log.warn(
        { error, operation, addressableId },
        'Failed to persist repost change to local store',
      )
    }
  }

  private broadcast(): void {
    this.repostedIds.publish(this._index.keys())
  }

  private handleAuthChange(isAuthenticated: boolean): void {
    if (isAuthenticated === this._isAuthenticated) return
    this._isAuthenticated = isAuthenticated

    if (isAuthenticated) {
      // Re-seed lazily on the next operation
      this._isInitialized = false
      return
    }

    this.clearCache().catch((error) => {
      this.log.error({ error }, 'Failed to clear repost cache after sign out')
    })
  }
}
