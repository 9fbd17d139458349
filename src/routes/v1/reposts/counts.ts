import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  RepostCountQuerySchema,
  RepostCountResponseSchema,
  RepostersQuerySchema,
  RepostersResponseSchema,
} from '@schemas/reposts/reposts.schema.js'
import { assertAddressableId } from '@services/reposts/index.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/count',
    {
      schema: {
        summary: 'Count reposts',
        operationId: 'getRepostCount',
        description:
          'Counts reposts on the relays by addressable ID, or by event ID for relays that only index e tags. Pass exactly one.',
        querystring: RepostCountQuerySchema,
        response: {
          200: RepostCountResponseSchema,
          400: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request, reply) => {
      const { addressableId, eventId } = request.query

      let countReposts: () => Promise<number>
      if (addressableId !== undefined && eventId === undefined) {
        assertAddressableId(addressableId)
        countReposts = () => fastify.reposts.getRepostCount(addressableId)
      } else if (eventId !== undefined && addressableId === undefined) {
        countReposts = () => fastify.reposts.getRepostCountByEventId(eventId)
      } else {
        return reply.badRequest(
          'Provide exactly one of addressableId or eventId',
        )
      }

      try {
        return { count: await countReposts() }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to count reposts',
          addressableId,
          eventId,
        })
        return reply.badGateway('Failed to count reposts')
      }
    },
  )

  fastify.get(
    '/reposters',
    {
      schema: {
        summary: 'List reposters',
        operationId: 'getReposters',
        description: 'Distinct pubkeys that reposted an event',
        querystring: RepostersQuerySchema,
        response: {
          200: RepostersResponseSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request, reply) => {
      const { eventId } = request.query
      try {
        const pubkeys = await fastify.reposts.getReposters(eventId)
        return { eventId, pubkeys }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to fetch reposters',
          eventId,
        })
        return reply.badGateway('Failed to fetch reposters')
      }
    },
  )
}

export default plugin
