import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { DbRepostsLocalStore } from '@services/reposts/index.js'
import { RepostsService } from '@services/reposts.service.js'
import { createServiceLogger } from '@utils/logger.js'

declare module 'fastify' {
  interface FastifyInstance {
    reposts: RepostsService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const userPubkey = fastify.config.userPubkey
    const localStore = new DbRepostsLocalStore(
      fastify.db,
      userPubkey,
      createServiceLogger(fastify.log, 'REPOSTS_STORE'),
    )

    const service = new RepostsService(
      fastify.log,
      {
        gateway: fastify.relayGateway,
        userPubkey,
        localStore,
        authState: fastify.session,
      },
      {
        fetchLimit: fastify.config.repostFetchLimit,
        targetKind: fastify.config.repostTargetKind,
      },
    )
    fastify.decorate('reposts', service)

    fastify.addHook('onClose', async () => {
      service.dispose()
    })
  },
  {
    name: 'reposts',
    dependencies: ['config', 'database', 'relay-gateway', 'session'],
  },
)
