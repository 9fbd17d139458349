import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  UserRepostsParamsSchema,
  UserRepostsQuerySchema,
  UserRepostsResponseSchema,
} from '@schemas/reposts/reposts.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/users/:pubkey',
    {
      schema: {
        summary: "Get a user's reposts",
        operationId: 'getUserReposts',
        description:
          'Queries the relays for the content a user has reposted, most recent first. Pass records=true for full records.',
        params: UserRepostsParamsSchema,
        querystring: UserRepostsQuerySchema,
        response: {
          200: UserRepostsResponseSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request) => {
      const { pubkey } = request.params

      if (request.query.records === 'true') {
        const records = await fastify.reposts.fetchUserRepostRecords(pubkey)
        return { pubkey, records }
      }

      const addressableIds = await fastify.reposts.fetchUserReposts(pubkey)
      return { pubkey, addressableIds }
    },
  )
}

export default plugin
