/**
 * Event kinds the repost subsystem reads or writes.
 */
export const EventKind = {
  /** Deletion request (retracts an event by id) */
  DELETION: 5,
  /** Legacy repost of a regular event */
  REPOST: 6,
  /** Generic repost, references addressable content with an `a` tag */
  GENERIC_REPOST: 16,
  /** Addressable short video */
  VIDEO_VERTICAL: 34236,
} as const

export type EventKindValue = (typeof EventKind)[keyof typeof EventKind]

/**
 * Signed event as returned by the relay gateway.
 */
export interface NostrEvent {
  id: string
  pubkey: string
  created_at: number
  kind: number
  tags: string[][]
  content: string
  sig?: string
}

/**
 * Relay query filter. Tag filters use the `#<letter>` keys relays expect.
 */
export interface EventFilter {
  ids?: string[]
  authors?: string[]
  kinds?: number[]
  '#a'?: string[]
  '#e'?: string[]
  '#p'?: string[]
  since?: number
  until?: number
  limit?: number
}

export interface CountResult {
  count: number
}

/**
 * Publishes and queries events against the relay network.
 *
 * Publishing resolves to null when no relay accepted the event.
 * Queries and counts reject on transport or gateway errors.
 */
export interface EventGateway {
  publishRepostAssertion(
    addressableId: string,
    targetKind: number,
    originalAuthorPubkey: string,
    eventId?: string,
  ): Promise<NostrEvent | null>
  publishRetraction(eventId: string): Promise<NostrEvent | null>
  queryEvents(filters: EventFilter[]): Promise<NostrEvent[]>
  countEvents(filters: EventFilter[]): Promise<CountResult>
}
