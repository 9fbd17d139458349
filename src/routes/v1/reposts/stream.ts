import { randomUUID } from 'node:crypto'
import {
  type RepostedIdsEvent,
  RepostedIdsStreamResponseSchema,
} from '@schemas/reposts/reposts.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const toMessage = (addressableIds: Iterable<string>) => {
  const event: RepostedIdsEvent = { addressableIds: [...addressableIds] }
  return { event: 'reposted-ids', data: JSON.stringify(event) }
}

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/stream',
    {
      schema: {
        summary: 'Stream reposted content',
        operationId: 'streamReposts',
        description:
          'Server-Sent Events stream of the reposted addressable IDs. Sends the current set on connect, then a new set after every change.',
        response: {
          200: RepostedIdsStreamResponseSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request, reply) => {
      const connectionId = randomUUID()
      const reposts = fastify.reposts
      const abortController = new AbortController()

      fastify.log.debug({ connectionId }, 'Repost stream opened')

      request.socket.on('close', () => {
        fastify.log.debug({ connectionId }, 'Repost stream closed')
        abortController.abort()
      })

      // Seed the index so the first frame is the stored set
      await reposts.getRepostedAddressableIds()
      if (abortController.signal.aborted) {
        return reply.code(204).send()
      }
      const snapshots = reposts.streamRepostedAddressableIds(
        abortController.signal,
      )

      return reply.sse(
        (async function* source() {
          try {
            for await (const addressableIds of snapshots) {
              yield toMessage(addressableIds)
            }
          } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
              return
            }
            logRouteError(fastify.log, request, error, {
              message: 'SSE stream error',
              connectionId,
            })
          }
        })(),
      )
    },
  )
}

export default plugin
