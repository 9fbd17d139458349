import type { FastifyInstance } from 'fastify'
import { HttpResponse, http } from 'msw'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import { getTestDatabase, resetDatabase } from '../../helpers/database.js'
import { createRepostEvent, InMemoryRelay } from '../../mocks/in-memory-relay.js'
import {
  createRelayGatewayHandlers,
  TEST_GATEWAY_URL,
} from '../../mocks/relay-gateway-handlers.js'
import { server } from '../../setup/msw-setup.js'

const VIDEO = '34236:abc:vine1'
const OTHER_VIDEO = '34236:def:vine2'

const failGateway = (path: string) =>
  server.use(
    http.post(
      `${TEST_GATEWAY_URL}${path}`,
      () => new HttpResponse(null, { status: 500 }),
    ),
  )

describe('Reposts routes', () => {
  let app: FastifyInstance
  let relay: InMemoryRelay

  beforeEach(async () => {
    relay = new InMemoryRelay()
    server.use(...createRelayGatewayHandlers(relay))
    app = await build()
    await resetDatabase()
  })

  afterEach(async () => {
    await app.close()
  })

  const repost = (addressableId = VIDEO) =>
    app.inject({
      method: 'POST',
      url: '/v1/reposts',
      payload: { addressableId, originalAuthorPubkey: 'abc' },
    })

  describe('POST /v1/reposts', () => {
    it('should publish the repost and cache it', async () => {
      const response = await repost()

      expect(response.statusCode).toBe(201)
      expect(response.json()).toEqual({ repostEventId: 'event-1' })
      expect(relay.events[0].tags).toEqual([
        ['k', '34236'],
        ['a', VIDEO],
        ['p', 'abc'],
      ])

      const rows = await getTestDatabase()('personal_reposts').select()
      expect(rows).toEqual([
        {
          user_pubkey: 'test-user-pubkey',
          addressable_id: VIDEO,
          repost_event_id: 'event-1',
          original_author_pubkey: 'abc',
          created_at: 1_700_000_000,
        },
      ])

      const status = await app.inject({
        method: 'GET',
        url: '/v1/reposts/status',
        query: { addressableId: VIDEO },
      })
      expect(status.json()).toEqual({ addressableId: VIDEO, reposted: true })
    })

    it('should answer 409 for content already reposted', async () => {
      await repost()

      const response = await repost()

      expect(response.statusCode).toBe(409)
      expect(response.json()).toEqual({
        statusCode: 409,
        code: 'ALREADY_REPOSTED',
        error: 'Conflict',
        message: `Already reposted: ${VIDEO}`,
      })
      expect(relay.events).toHaveLength(1)
    })

    it('should answer 400 for a malformed addressable id', async () => {
      const response = await repost('not-an-addressable-id')

      expect(response.statusCode).toBe(400)
      expect(response.json()).toEqual({
        statusCode: 400,
        code: 'MISSING_REFERENCE',
        error: 'Bad Request',
        message:
          'Content is missing an addressable reference: not-an-addressable-id',
      })
    })

    it('should answer 502 when no relay accepts the repost', async () => {
      failGateway('/api/events')

      const response = await repost()

      expect(response.statusCode).toBe(502)
      expect(response.json()).toEqual({
        statusCode: 502,
        code: 'REPOST_FAILED',
        error: 'Bad Gateway',
        message: 'Failed to publish repost to relays',
      })
    })
  })

  describe('DELETE /v1/reposts', () => {
    it('should retract an existing repost', async () => {
      await repost()

      const response = await app.inject({
        method: 'DELETE',
        url: '/v1/reposts',
        payload: { addressableId: VIDEO },
      })

      expect(response.statusCode).toBe(204)
      expect(relay.events[1]).toMatchObject({
        kind: 5,
        tags: [
          ['e', 'event-1'],
          ['k', '16'],
        ],
      })
      const rows = await getTestDatabase()('personal_reposts').select()
      expect(rows).toEqual([])
    })

    it('should answer 404 for content that is not reposted', async () => {
      const response = await app.inject({
        method: 'DELETE',
        url: '/v1/reposts',
        payload: { addressableId: VIDEO },
      })

      expect(response.statusCode).toBe(404)
      expect(response.json()).toMatchObject({ code: 'NOT_REPOSTED' })
      expect(relay.events).toHaveLength(0)
    })
  })

  describe('POST /v1/reposts/toggle', () => {
    it('should flip the repost state', async () => {
      const toggle = () =>
        app.inject({
          method: 'POST',
          url: '/v1/reposts/toggle',
          payload: { addressableId: VIDEO, originalAuthorPubkey: 'abc' },
        })

      expect((await toggle()).json()).toEqual({
        addressableId: VIDEO,
        reposted: true,
      })
      expect((await toggle()).json()).toEqual({
        addressableId: VIDEO,
        reposted: false,
      })
      expect(relay.events.map((event) => event.kind)).toEqual([16, 5])
    })
  })

  describe('GET /v1/reposts', () => {
    it('should list reposted content most recent first', async () => {
      await repost(VIDEO)
      await repost(OTHER_VIDEO)

      const response = await app.inject({ method: 'GET', url: '/v1/reposts' })

      expect(response.json()).toEqual({
        addressableIds: [OTHER_VIDEO, VIDEO],
      })
    })

    it('should return the stored record', async () => {
      await repost()

      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/record',
        query: { addressableId: VIDEO },
      })

      expect(response.json()).toEqual({
        addressableId: VIDEO,
        repostEventId: 'event-1',
        originalAuthorPubkey: 'abc',
        createdAt: 1_700_000_000,
      })
    })

    it('should answer 404 when there is no record', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/record',
        query: { addressableId: VIDEO },
      })

      expect(response.statusCode).toBe(404)
    })
  })

  describe('POST /v1/reposts/sync', () => {
    it('should return the reposts found on the relays', async () => {
      relay.add(createRepostEvent({ id: 'r-1', createdAt: 100, addressableId: VIDEO }))
      relay.add(
        createRepostEvent({ id: 'r-2', createdAt: 200, addressableId: OTHER_VIDEO }),
      )

      const response = await app.inject({
        method: 'POST',
        url: '/v1/reposts/sync',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json()).toEqual({
        orderedAddressableIds: [OTHER_VIDEO, VIDEO],
        addressableIdToRepostId: { [VIDEO]: 'r-1', [OTHER_VIDEO]: 'r-2' },
      })
    })

    it('should skip malformed relay events without failing the sync', async () => {
      const good = createRepostEvent({
        id: 'r-1',
        createdAt: 100,
        addressableId: VIDEO,
        authorPubkey: 'abc',
      })
      server.use(
        http.post(`${TEST_GATEWAY_URL}/api/query`, () =>
          HttpResponse.json({
            events: [
              good,
              {
                ...good,
                id: 'r-2',
                created_at: 200,
                tags: [
                  ['a', OTHER_VIDEO],
                  ['p', 'def'],
                  ['imeta', 5],
                ],
              },
            ],
          }),
        ),
      )

      const response = await app.inject({
        method: 'POST',
        url: '/v1/reposts/sync',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json()).toEqual({
        orderedAddressableIds: [VIDEO],
        addressableIdToRepostId: { [VIDEO]: 'r-1' },
      })
    })

    it('should answer 502 when the relays fail and nothing is cached', async () => {
      failGateway('/api/query')

      const response = await app.inject({
        method: 'POST',
        url: '/v1/reposts/sync',
      })

      expect(response.statusCode).toBe(502)
      expect(response.json()).toMatchObject({ code: 'SYNC_FAILED' })
    })
  })

  describe('GET /v1/reposts/users/:pubkey', () => {
    beforeEach(() => {
      relay.add(
        createRepostEvent({
          id: 'r-1',
          pubkey: 'other-user',
          createdAt: 100,
          addressableId: VIDEO,
        }),
      )
    })

    it("should list another user's reposted content", async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/users/other-user',
      })

      expect(response.json()).toEqual({
        pubkey: 'other-user',
        addressableIds: [VIDEO],
      })
    })

    it('should return full records when asked', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/users/other-user',
        query: { records: 'true' },
      })

      expect(response.json()).toEqual({
        pubkey: 'other-user',
        records: [
          {
            addressableId: VIDEO,
            repostEventId: 'r-1',
            originalAuthorPubkey: 'author-pubkey',
            createdAt: 100,
          },
        ],
      })
    })

    it('should answer 502 when the relays fail', async () => {
      failGateway('/api/query')

      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/users/other-user',
      })

      expect(response.statusCode).toBe(502)
      expect(response.json()).toMatchObject({ code: 'FETCH_REPOSTS_FAILED' })
    })
  })

  describe('counts', () => {
    beforeEach(() => {
      const tagged = createRepostEvent({
        id: 'r-1',
        pubkey: 'reposter-1',
        createdAt: 100,
        addressableId: VIDEO,
      })
      relay.add({ ...tagged, tags: [...tagged.tags, ['e', 'video-event']] })
      relay.add(
        createRepostEvent({
          id: 'r-2',
          pubkey: 'reposter-2',
          createdAt: 200,
          addressableId: VIDEO,
        }),
      )
    })

    it('should count reposts by addressable id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/count',
        query: { addressableId: VIDEO },
      })

      expect(response.json()).toEqual({ count: 2 })
    })

    it('should count reposts by event id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/count',
        query: { eventId: 'video-event' },
      })

      expect(response.json()).toEqual({ count: 1 })
    })

    it('should require exactly one identifier', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/count',
        query: { addressableId: VIDEO, eventId: 'video-event' },
      })

      expect(response.statusCode).toBe(400)
      expect(response.json()).toMatchObject({
        message: 'Provide exactly one of addressableId or eventId',
      })
    })

    it('should answer 502 when counting fails', async () => {
      failGateway('/api/count')

      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/count',
        query: { addressableId: VIDEO },
      })

      expect(response.statusCode).toBe(502)
    })

    it('should list the reposters of an event', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/v1/reposts/reposters',
        query: { eventId: 'video-event' },
      })

      expect(response.json()).toEqual({
        eventId: 'video-event',
        pubkeys: ['reposter-1'],
      })
    })
  })
})

describe('Reposts routes while signed out', () => {
  let app: FastifyInstance
  let relay: InMemoryRelay

  beforeEach(async () => {
    relay = new InMemoryRelay()
    server.use(...createRelayGatewayHandlers(relay))
    app = await build(undefined, { startAuthenticated: false })
    await resetDatabase()
  })

  afterEach(async () => {
    await app.close()
  })

  it('should reject mutations with 401', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/reposts',
      payload: { addressableId: VIDEO, originalAuthorPubkey: 'abc' },
    })

    expect(response.statusCode).toBe(401)
    expect(response.json()).toEqual({
      statusCode: 401,
      code: 'NOT_AUTHENTICATED',
      error: 'Unauthorized',
      message: 'Sign in to repost',
    })
    expect(relay.events).toHaveLength(0)
  })

  it('should keep reads open', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/reposts' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({ addressableIds: [] })
  })
})
