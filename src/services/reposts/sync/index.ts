export {
  buildSyncResult,
  mergeIncomingRecords,
  sortByRecency,
} from './record-merger.js'
