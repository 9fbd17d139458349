/**
 * A single repost made by the local user.
 *
 * Keyed by the addressable ID of the reposted content. Records are never
 * mutated; an update replaces the record for its addressable ID.
 */
export interface RepostRecord {
  /** Addressable ID of the reposted content (`kind:pubkey:d-tag`) */
  readonly addressableId: string
  /** ID of the kind 16 event asserting the repost, needed to retract it */
  readonly repostEventId: string
  /** Pubkey of the reposted content's author */
  readonly originalAuthorPubkey: string
  /** Unix timestamp (seconds) of the repost event */
  readonly createdAt: number
}

/**
 * Snapshot of the local user's reposts produced by a sync.
 */
export interface RepostsSyncResult {
  /** Addressable IDs ordered by repost recency, most recent first */
  orderedAddressableIds: string[]
  /** Addressable ID to repost event ID */
  addressableIdToRepostId: Record<string, string>
}

export interface RepostParams {
  addressableId: string
  originalAuthorPubkey: string
  /** Event ID of the reposted content, added as an `e` tag for relays that only index `#e` */
  eventId?: string
}

export type RepostedIdsListener = (addressableIds: ReadonlySet<string>) => void

export type Unsubscribe = () => void

/**
 * Durable per-user storage for repost records.
 *
 * Implementations are scoped to one user pubkey.
 */
export interface RepostsLocalStore {
  upsert(record: RepostRecord): Promise<void>
  upsertBatch(records: readonly RepostRecord[]): Promise<void>
  /** Returns true when a row was removed */
  delete(addressableId: string): Promise<boolean>
  get(addressableId: string): Promise<RepostRecord | null>
  getEventId(addressableId: string): Promise<string | null>
  getAll(): Promise<RepostRecord[]>
  getAllAddressableIds(): Promise<Set<string>>
  contains(addressableId: string): Promise<boolean>
  /** Emits the current set immediately, then after every write */
  watchAllAddressableIds(listener: RepostedIdsListener): Unsubscribe
  clearAllForUser(): Promise<void>
}

/**
 * Source of authentication state for the local session.
 */
export interface AuthStateSource {
  readonly isAuthenticated: boolean
  subscribe(listener: (isAuthenticated: boolean) => void): Unsubscribe
}
