import type {
  RepostRecord,
  RepostsSyncResult,
} from '@root/types/reposts.types.js'

/**
 * Orders records most recent first.
 *
 * Array#sort is stable, so records sharing a timestamp keep their input order.
 */
export function sortByRecency(
  records: Iterable<RepostRecord>,
): RepostRecord[] {
  return [...records].sort((a, b) => b.createdAt - a.createdAt)
}

/**
 * Merges relay records into the in-memory index.
 *
 * An incoming record replaces the indexed one only when none exists or the
 * incoming one is strictly newer, so a record never regresses to an older
 * repost of the same content.
 *
 * @param index - Addressable ID to record; mutated in place
 * @param incoming - Records built from relay events
 * @returns Records that were inserted or replaced, for persisting
 */
export function mergeIncomingRecords(
  index: Map<string, RepostRecord>,
  incoming: readonly RepostRecord[],
): RepostRecord[] {
  const changed = new Map<string, RepostRecord>()

  for (const record of incoming) {
    const existing = index.get(record.addressableId)
    if (existing && record.createdAt <= existing.createdAt) continue

    index.set(record.addressableId, record)
    changed.set(record.addressableId, record)
  }

  return [...changed.values()]
}

/**
 * Projects the index into a sync result ordered by recency.
 */
export function buildSyncResult(
  index: ReadonlyMap<string, RepostRecord>,
): RepostsSyncResult {
  const sorted = sortByRecency(index.values())
  const addressableIdToRepostId: Record<string, string> = {}
  for (const record of sorted) {
    addressableIdToRepostId[record.addressableId] = record.repostEventId
  }

  return {
    orderedAddressableIds: sorted.map((record) => record.addressableId),
    addressableIdToRepostId,
  }
}
