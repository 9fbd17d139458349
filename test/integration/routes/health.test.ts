import type { FastifyInstance } from 'fastify'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import { resetDatabase } from '../../helpers/database.js'
import { InMemoryRelay } from '../../mocks/in-memory-relay.js'
import { createRelayGatewayHandlers } from '../../mocks/relay-gateway-handlers.js'
import { server } from '../../setup/msw-setup.js'

describe('GET /health', () => {
  let app: FastifyInstance

  beforeEach(async () => {
    server.use(...createRelayGatewayHandlers(new InMemoryRelay()))
    app = await build()
    await resetDatabase()
  })

  afterEach(async () => {
    await app.close()
  })

  it('should report a healthy service with an empty cache', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toMatchObject({
      status: 'healthy',
      checks: {
        database: 'ok',
        repostCache: { initialized: false, cached: 0 },
      },
    })
  })

  it('should count cached reposts once the cache is loaded', async () => {
    await app.inject({
      method: 'POST',
      url: '/v1/reposts',
      payload: { addressableId: '34236:abc:vine1', originalAuthorPubkey: 'abc' },
    })

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.json()).toMatchObject({
      checks: { repostCache: { initialized: true, cached: 1 } },
    })
  })

  it('should answer 503 when the database is unreachable', async () => {
    await app.db.knex.destroy()

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(503)
    expect(response.json()).toMatchObject({
      status: 'unhealthy',
      checks: { database: 'failed' },
    })
  })
})
