import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Answers unknown routes with the shared error shape. Rate limited per client
 * so route scanning stays cheap.
 */
async function notFoundHandler(fastify: FastifyInstance) {
  fastify.setNotFoundHandler(
    {
      preHandler: fastify.rateLimit({
        max: 3,
        timeWindow: 500,
      }),
    },
    (request, reply) => {
      const path = request.url.split('?')[0]
      request.log.debug(
        { request: { id: request.id, method: request.method, path } },
        'No route matched',
      )

      reply.code(404)
      const response: ErrorResponse = {
        statusCode: 404,
        code: 'ROUTE_NOT_FOUND',
        error: 'Not Found',
        message: `No route for ${request.method} ${path}`,
      }
      return response
    },
  )
}

export default fp(notFoundHandler, {
  name: 'not-found',
  dependencies: ['rate-limit'],
})
