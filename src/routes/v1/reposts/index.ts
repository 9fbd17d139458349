import { NotAuthenticatedError } from '@root/types/errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'
import countsRoute from './counts.js'
import repostsRoute from './reposts.js'
import streamRoute from './stream.js'
import syncRoute from './sync.js'
import usersRoute from './users.js'

const repostsPlugin: FastifyPluginAsyncZod = async (fastify) => {
  // Reads stay open while signed out; anything that publishes or syncs does not
  fastify.addHook('onRequest', async (request) => {
    if (request.method === 'GET' || request.method === 'HEAD') return
    if (!fastify.session.isAuthenticated) {
      throw new NotAuthenticatedError()
    }
  })

  await fastify.register(repostsRoute)
  await fastify.register(syncRoute)
  await fastify.register(usersRoute)
  await fastify.register(countsRoute)
  await fastify.register(streamRoute)
}

export default repostsPlugin
