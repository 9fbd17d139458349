/**
 * Relay Gateway Service
 *
 * HTTP client for the relay gateway, which signs events with the local
 * user's key and fans publishes, queries and counts out to the relay pool.
 *
 * Publishing fails soft (null) so callers can turn it into a domain error;
 * queries and counts throw.
 */

import {
  CountEventsResponseSchema,
  NostrEventSchema,
  PublishEventResponseSchema,
  QueryEventsResponseSchema,
} from '@schemas/gateway/gateway.schema.js'
import {
  type CountResult,
  type EventFilter,
  type EventGateway,
  EventKind,
  type NostrEvent,
} from '@root/types/event-gateway.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

export interface RelayGatewayOptions {
  baseUrl: string
  apiKey: string
  timeoutMs: number
}

interface UnsignedEventTemplate {
  kind: number
  content: string
  tags: string[][]
}

export class RelayGatewayService implements EventGateway {
  private static readonly USER_AGENT = 'repost-sync/1.0'

  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly options: RelayGatewayOptions,
  ) {
    this.log = createServiceLogger(baseLog, 'RELAY_GATEWAY')
  }

  /**
   * Builds the generic repost template for addressable content.
   *
   * Tag order is `k`, `a`, `p`, then `e` when the content's event ID is known.
   */
  static buildRepostAssertion(
    addressableId: string,
    targetKind: number,
    originalAuthorPubkey: string,
    eventId?: string,
  ): UnsignedEventTemplate {
    const tags = [
      ['k', String(targetKind)],
      ['a', addressableId],
      ['p', originalAuthorPubkey],
    ]
    if (eventId) {
      tags.push(['e', eventId])
    }
    return { kind: EventKind.GENERIC_REPOST, content: '', tags }
  }

  static buildRetraction(eventId: string): UnsignedEventTemplate {
    return {
      kind: EventKind.DELETION,
      content: '',
      tags: [
        ['e', eventId],
        ['k', String(EventKind.GENERIC_REPOST)],
      ],
    }
  }

  publishRepostAssertion(
    addressableId: string,
    targetKind: number,
    originalAuthorPubkey: string,
    eventId?: string,
  ): Promise<NostrEvent | null> {
    return this.publish(
      RelayGatewayService.buildRepostAssertion(
        addressableId,
        targetKind,
        originalAuthorPubkey,
        eventId,
      ),
    )
  }

  publishRetraction(eventId: string): Promise<NostrEvent | null> {
    return this.publish(RelayGatewayService.buildRetraction(eventId))
  }

  async queryEvents(filters: EventFilter[]): Promise<NostrEvent[]> {
    const response = await this.post(
      '/api/query',
      { filters },
      QueryEventsResponseSchema,
    )

    const events: NostrEvent[] = []
    for (const candidate of response.events) {
      const parsed = NostrEventSchema.safeParse(candidate)
      if (parsed.success) {
        events.push(parsed.data)
      }
    }

    const skipped = response.events.length - events.length
    if (skipped > 0) {
      this.log.debug({ skipped }, 'Dropped malformed events from relay query')
    }
    this.log.debug({ filters, events: events.length }, 'Queried relay events')
    return events
  }

  async countEvents(filters: EventFilter[]): Promise<CountResult> {
    const response = await this.post(
      '/api/count',
      { filters },
      CountEventsResponseSchema,
    )
    return { count: response.count }
  }

  private async publish(
    template: UnsignedEventTemplate,
  ): Promise<NostrEvent | null> {
    try {
      const response = await this.post(
        '/api/events',
        template,
        PublishEventResponseSchema,
      )
      if (!response.event) {
        this.log.warn({ kind: template.kind }, 'No relay accepted the event')
      }
      return response.event
    } catch (error) {
      this.log.error(
        { error, kind: template.kind },
        'Failed to publish event through relay gateway',
      )
      return null
    }
  }

  private async post<T>(
    path: string,
    body: unknown,
    schema: z.ZodType<T>,
  ): Promise<T> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${path}`
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': RelayGatewayService.USER_AGENT,
    }
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    })

    if (!response.ok) {
      throw new Error(
        `Relay gateway ${path} failed: ${response.status} ${response.statusText}`,
      )
    }

    const parsed = schema.safeParse(await response.json())
    if (!parsed.success) {
      throw new Error(
        `Relay gateway ${path} returned an unexpected response: ${parsed.error.message}`,
      )
    }
    return parsed.data
  }
}
