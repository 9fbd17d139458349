import envPlugin from '@plugins/external/env.js'
import helmetPlugin from '@plugins/external/helmet.js'
import rateLimitPlugin from '@plugins/external/rate-limit.js'
import sensiblePlugin from '@plugins/external/sensible.js'
import ssePlugin from '@plugins/external/sse.js'
import swaggerPlugin from '@plugins/external/swagger.js'
import databasePlugin from '@plugins/custom/database.js'
import errorHandlerPlugin from '@plugins/custom/error-handler.js'
import notFoundPlugin from '@plugins/custom/not-found.js'
import relayGatewayPlugin from '@plugins/custom/relay-gateway.js'
import repostsPlugin from '@plugins/custom/reposts.js'
import sessionPlugin from '@plugins/custom/session.js'
import healthRoute from '@root/routes/health.js'
import repostsRoutes from '@root/routes/v1/reposts/index.js'
import sessionRoutes from '@root/routes/v1/session/session.js'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

export const options = {
  ajv: {
    customOptions: {
      coerceTypes: 'array',
      removeAdditional: 'all',
    },
  },
} as const

/**
 * Configures the Fastify server: configuration, external plugins, the repost
 * services, error handling and the HTTP routes.
 *
 * Plugins are registered explicitly in dependency order so every module is
 * loaded once through the same resolver.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  _opts: FastifyPluginOptions,
) {
  // External plugins
  await fastify.register(envPlugin)
  await fastify.register(sensiblePlugin)
  await fastify.register(swaggerPlugin)
  await fastify.register(ssePlugin)
  await fastify.register(rateLimitPlugin)
  await fastify.register(helmetPlugin)

  // Custom plugins
  await fastify.register(databasePlugin)
  await fastify.register(sessionPlugin)
  await fastify.register(relayGatewayPlugin)
  await fastify.register(repostsPlugin)
  await fastify.register(errorHandlerPlugin)
  await fastify.register(notFoundPlugin)

  // Routes
  await fastify.register(healthRoute)
  await fastify.register(repostsRoutes, { prefix: '/v1/reposts' })
  await fastify.register(sessionRoutes, { prefix: '/v1/session' })
}
