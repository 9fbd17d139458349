export {
  assertAddressableId,
  extractAddressableId,
  extractOriginalAuthorPubkey,
  extractTagValue,
  isAddressableId,
  recordFromEvent,
} from './tag-extraction.js'
