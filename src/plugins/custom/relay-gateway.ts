import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { RelayGatewayService } from '@services/relay-gateway.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    relayGateway: RelayGatewayService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new RelayGatewayService(fastify.log, {
      baseUrl: fastify.config.gatewayUrl,
      apiKey: fastify.config.gatewayApiKey,
      timeoutMs: fastify.config.gatewayTimeoutMs,
    })
    fastify.decorate('relayGateway', service)
  },
  {
    name: 'relay-gateway',
    dependencies: ['config'],
  },
)
