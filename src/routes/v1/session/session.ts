import { SessionStateResponseSchema } from '@schemas/session/session.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Get session state',
        operationId: 'getSession',
        description: 'Whether the local user is signed in',
        response: {
          200: SessionStateResponseSchema,
        },
        tags: ['Session'],
      },
    },
    async () => {
      return fastify.session.state
    },
  )

  fastify.post(
    '/login',
    {
      schema: {
        summary: 'Sign in',
        operationId: 'login',
        description:
          'Signs the local user in. Cached reposts are reloaded on the next repost operation.',
        response: {
          200: SessionStateResponseSchema,
        },
        tags: ['Session'],
      },
    },
    async () => {
      return fastify.session.login()
    },
  )

  fastify.post(
    '/logout',
    {
      schema: {
        summary: 'Sign out',
        operationId: 'logout',
        description:
          'Signs the local user out and clears the local repost cache. Reposts on the relays are kept.',
        response: {
          200: SessionStateResponseSchema,
        },
        tags: ['Session'],
      },
    },
    async () => {
      return fastify.session.logout()
    },
  )
}

export default plugin
