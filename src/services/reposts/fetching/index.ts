export {
  getRepostCount,
  getRepostCountByEventId,
  getReposters,
  type RepostCountsDeps,
} from './repost-counts.js'
export {
  fetchUserRepostRecords,
  fetchUserReposts,
  queryRepostEvents,
  type UserRepostsDeps,
} from './user-reposts.js'
