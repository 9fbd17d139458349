/**
 * User Reposts
 *
 * Read-through relay queries for any user's generic reposts. Nothing here
 * touches the local index or store.
 */

import {
  type EventGateway,
  EventKind,
  type NostrEvent,
} from '@root/types/event-gateway.types.js'
import {
  describeError,
  FetchRepostsFailedError,
} from '@root/types/errors.js'
import type { RepostRecord } from '@root/types/reposts.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { sortByRecency } from '../sync/record-merger.js'
import {
  extractAddressableId,
  recordFromEvent,
} from '../utils/tag-extraction.js'

export interface UserRepostsDeps {
  gateway: EventGateway
  logger: FastifyBaseLogger
  fetchLimit: number
}

/**
 * Queries the kind 16 reposts authored by a pubkey.
 *
 * Gateway errors propagate unchanged.
 */
export function queryRepostEvents(
  pubkey: string,
  deps: UserRepostsDeps,
): Promise<NostrEvent[]> {
  return deps.gateway.queryEvents([
    {
      kinds: [EventKind.GENERIC_REPOST],
      authors: [pubkey],
      limit: deps.fetchLimit,
    },
  ])
}

async function queryOrFail(
  pubkey: string,
  deps: UserRepostsDeps,
): Promise<NostrEvent[]> {
  try {
    return await queryRepostEvents(pubkey, deps)
  } catch (error) {
    deps.logger.error({ error, pubkey }, 'Failed to query user reposts')
    throw new FetchRepostsFailedError(pubkey, describeError(error))
  }
}

/**
 * Addressable IDs a user has reposted, most recent first, each listed once.
 */
export async function fetchUserReposts(
  pubkey: string,
  deps: UserRepostsDeps,
): Promise<string[]> {
  const events = await queryOrFail(pubkey, deps)
  const sorted = [...events].sort((a, b) => b.created_at - a.created_at)

  const seen = new Set<string>()
  const addressableIds: string[] = []
  for (const event of sorted) {
    const addressableId = extractAddressableId(event)
    if (!addressableId || seen.has(addressableId)) continue
    seen.add(addressableId)
    addressableIds.push(addressableId)
  }

  deps.logger.debug(
    { pubkey, events: events.length, addressableIds: addressableIds.length },
    'Fetched user reposts',
  )
  return addressableIds
}

/**
 * Full repost records for a user, most recent first, one per addressable ID.
 * Events missing an `a` or `p` tag are skipped.
 */
export async function fetchUserRepostRecords(
  pubkey: string,
  deps: UserRepostsDeps,
): Promise<RepostRecord[]> {
  const events = await queryOrFail(pubkey, deps)

  const seen = new Set<string>()
  const records: RepostRecord[] = []
  for (const record of sortByRecency(
    events.flatMap((event) => recordFromEvent(event) ?? []),
  )) {
    if (seen.has(record.addressableId)) continue
    seen.add(record.addressableId)
    records.push(record)
  }

  return records
}
