/**
 * Reposts Module
 *
 * Re-exports from submodules for repost synchronization.
 */

// Cache
export { DbRepostsLocalStore, RepostedIdsChannel } from './cache/index.js'
// Fetching
export {
  fetchUserRepostRecords,
  fetchUserReposts,
  getRepostCount,
  getRepostCountByEventId,
  getReposters,
  queryRepostEvents,
  type RepostCountsDeps,
  type UserRepostsDeps,
} from './fetching/index.js'
// Sync
export {
  buildSyncResult,
  mergeIncomingRecords,
  sortByRecency,
} from './sync/index.js'
// Utils
export {
  assertAddressableId,
  extractAddressableId,
  extractOriginalAuthorPubkey,
  extractTagValue,
  isAddressableId,
  recordFromEvent,
} from './utils/index.js'
