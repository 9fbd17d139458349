import { ErrorSchema } from '@schemas/common/error.schema.js'
import { SyncResultResponseSchema } from '@schemas/reposts/reposts.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/sync',
    {
      schema: {
        summary: 'Sync reposts',
        operationId: 'syncReposts',
        description:
          'Reconciles the local repost cache with the relays. Falls back to cached reposts when the relays are unreachable.',
        response: {
          200: SyncResultResponseSchema,
          401: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async () => {
      return fastify.reposts.syncUserReposts()
    },
  )
}

export default plugin
