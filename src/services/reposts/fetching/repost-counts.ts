/**
 * Repost Counts
 *
 * Relay-side counts and reposter lookups for a piece of content.
 */

import {
  type EventGateway,
  EventKind,
} from '@root/types/event-gateway.types.js'

export interface RepostCountsDeps {
  gateway: EventGateway
}

/**
 * Counts generic reposts referencing an addressable ID.
 */
export async function getRepostCount(
  addressableId: string,
  deps: RepostCountsDeps,
): Promise<number> {
  const result = await deps.gateway.countEvents([
    { kinds: [EventKind.GENERIC_REPOST], '#a': [addressableId] },
  ])
  return result.count
}

/**
 * Counts legacy and generic reposts referencing an event ID.
 *
 * Some relays only index `#e`, so this finds reposts that a `#a` count misses.
 */
export async function getRepostCountByEventId(
  eventId: string,
  deps: RepostCountsDeps,
): Promise<number> {
  const result = await deps.gateway.countEvents([
    {
      kinds: [EventKind.REPOST, EventKind.GENERIC_REPOST],
      '#e': [eventId],
    },
  ])
  return result.count
}

/**
 * Distinct pubkeys that reposted an event, in relay order.
 */
export async function getReposters(
  eventId: string,
  deps: RepostCountsDeps,
): Promise<string[]> {
  const events = await deps.gateway.queryEvents([
    {
      kinds: [EventKind.REPOST, EventKind.GENERIC_REPOST],
      '#e': [eventId],
    },
  ])
  return [...new Set(events.map((event) => event.pubkey))]
}
