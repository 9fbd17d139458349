import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { SessionService } from '@services/session.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    session: SessionService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new SessionService(
      fastify.log,
      fastify.config.userPubkey,
      fastify.config.startAuthenticated,
    )
    fastify.decorate('session', service)
  },
  {
    name: 'session',
    dependencies: ['config'],
  },
)
