import { MissingReferenceError } from '@root/types/errors.js'
import type { NostrEvent } from '@root/types/event-gateway.types.js'
import type { RepostRecord } from '@root/types/reposts.types.js'

/**
 * Addressable ID format: `kind:pubkey:d-tag`. The d-tag may itself contain colons.
 */
const ADDRESSABLE_ID_PATTERN = /^\d+:[^:\s]+:.+$/

export function isAddressableId(value: string): boolean {
  return ADDRESSABLE_ID_PATTERN.test(value)
}

export function assertAddressableId(value: string): void {
  if (!isAddressableId(value)) {
    throw new MissingReferenceError(value)
  }
}

/**
 * Returns the second element of the first tag whose head equals `marker`.
 *
 * Tags come off the wire loosely typed, so short or non-string tags are skipped
 * rather than trusted.
 */
export function extractTagValue(
  event: Pick<NostrEvent, 'tags'>,
  marker: string,
): string | null {
  if (!Array.isArray(event.tags)) return null

  for (const tag of event.tags) {
    if (!Array.isArray(tag) || tag.length < 2 || tag[0] !== marker) continue
    const value = tag[1]
    return typeof value === 'string' && value.length > 0 ? value : null
  }
  return null
}

/** Addressable ID referenced by a generic repost's `a` tag */
export function extractAddressableId(
  event: Pick<NostrEvent, 'tags'>,
): string | null {
  return extractTagValue(event, 'a')
}

/** Original author pubkey from a repost's `p` tag */
export function extractOriginalAuthorPubkey(
  event: Pick<NostrEvent, 'tags'>,
): string | null {
  return extractTagValue(event, 'p')
}

/**
 * Builds a repost record from a kind 16 event.
 *
 * @returns null when the event lacks an id, an `a` tag or a `p` tag
 */
export function recordFromEvent(event: NostrEvent): RepostRecord | null {
  const addressableId = extractAddressableId(event)
  const originalAuthorPubkey = extractOriginalAuthorPubkey(event)

  if (!event.id || !addressableId || !originalAuthorPubkey) {
    return null
  }

  return {
    addressableId,
    repostEventId: event.id,
    originalAuthorPubkey,
    createdAt: event.created_at,
  }
}
