export { DbRepostsLocalStore } from './local-store.js'
export { RepostedIdsChannel } from './reposted-ids-channel.js'
