import fp from 'fastify-plugin'
import sensible from '@fastify/sensible'

/**
 * Adds `reply.notFound()`, `reply.badGateway()` and the other HTTP error helpers.
 *
 * @see {@link https://github.com/fastify/fastify-sensible}
 */
export default fp(
  async (fastify) => {
    await fastify.register(sensible)
  },
  {
    name: 'sensible',
  },
)
