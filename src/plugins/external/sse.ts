import fp from 'fastify-plugin'
import { FastifySSEPlugin } from 'fastify-sse-v2'

/**
 * Adds `reply.sse()` for Server-Sent Events streams.
 *
 * @see {@link https://github.com/mpetrunic/fastify-sse-v2}
 */
export default fp(
  async (fastify) => {
    await fastify.register(FastifySSEPlugin)
  },
  {
    name: 'sse',
  },
)
