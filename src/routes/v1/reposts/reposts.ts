import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  AddressableIdQuerySchema,
  CreateRepostBodySchema,
  CreateRepostResponseSchema,
  DeleteRepostBodySchema,
  RepostedIdsResponseSchema,
  RepostRecordSchema,
  RepostStatusResponseSchema,
} from '@schemas/reposts/reposts.schema.js'
import { assertAddressableId } from '@services/reposts/index.js'
import { NotRepostedError } from '@root/types/errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'List reposted content',
        operationId: 'getRepostedAddressableIds',
        description:
          'Addressable IDs the local user has reposted, most recent first',
        response: {
          200: RepostedIdsResponseSchema,
        },
        tags: ['Reposts'],
      },
    },
    async () => {
      const addressableIds =
        await fastify.reposts.getOrderedRepostedAddressableIds()
      return { addressableIds }
    },
  )

  fastify.get(
    '/status',
    {
      schema: {
        summary: 'Get repost status',
        operationId: 'getRepostStatus',
        description: 'Whether the local user has reposted the content',
        querystring: AddressableIdQuerySchema,
        response: {
          200: RepostStatusResponseSchema,
          400: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request) => {
      const { addressableId } = request.query
      assertAddressableId(addressableId)
      const reposted = await fastify.reposts.isReposted(addressableId)
      return { addressableId, reposted }
    },
  )

  fastify.get(
    '/record',
    {
      schema: {
        summary: 'Get repost record',
        operationId: 'getRepostRecord',
        description: 'The local repost record for the content',
        querystring: AddressableIdQuerySchema,
        response: {
          200: RepostRecordSchema,
          400: ErrorSchema,
          404: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request) => {
      const { addressableId } = request.query
      assertAddressableId(addressableId)
      const record = await fastify.reposts.getRepostRecord(addressableId)
      if (!record) {
        throw new NotRepostedError(addressableId)
      }
      return record
    },
  )

  fastify.post(
    '/',
    {
      schema: {
        summary: 'Repost content',
        operationId: 'createRepost',
        description:
          'Publishes a generic repost of addressable content and caches it locally',
        body: CreateRepostBodySchema,
        response: {
          201: CreateRepostResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          409: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request, reply) => {
      assertAddressableId(request.body.addressableId)
      const repostEventId = await fastify.reposts.repostVideo(request.body)
      reply.status(201)
      return { repostEventId }
    },
  )

  fastify.delete(
    '/',
    {
      schema: {
        summary: 'Remove repost',
        operationId: 'deleteRepost',
        description:
          'Publishes a deletion for the local repost and removes it from the cache',
        body: DeleteRepostBodySchema,
        response: {
          400: ErrorSchema,
          401: ErrorSchema,
          404: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request, reply) => {
      const { addressableId } = request.body
      assertAddressableId(addressableId)
      await fastify.reposts.unrepostVideo(addressableId)
      return reply.status(204).send()
    },
  )

  fastify.post(
    '/toggle',
    {
      schema: {
        summary: 'Toggle repost',
        operationId: 'toggleRepost',
        description:
          'Reposts the content when it is not reposted, otherwise removes the repost',
        body: CreateRepostBodySchema,
        response: {
          200: RepostStatusResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          404: ErrorSchema,
          409: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Reposts'],
      },
    },
    async (request) => {
      const { addressableId } = request.body
      assertAddressableId(addressableId)
      const reposted = await fastify.reposts.toggleRepost(request.body)
      return { addressableId, reposted }
    },
  )
}

export default plugin
