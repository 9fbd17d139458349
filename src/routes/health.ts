import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports database connectivity and the state of the in-memory repost cache. Does not require a session.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      let dbStatus: 'ok' | 'failed' = 'ok'

      try {
        await fastify.db.knex.raw('SELECT 1')
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: database connectivity error',
        )
        dbStatus = 'failed'
      }

      const isHealthy = dbStatus === 'ok'
      const body: HealthCheckResponse = {
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          database: dbStatus,
          repostCache: {
            initialized: fastify.reposts.isInitialized,
            cached: fastify.reposts.currentRepostedIds.size,
          },
        },
      }
      return reply.status(isHealthy ? 200 : 503).send(body)
    },
  )
}

export default plugin
