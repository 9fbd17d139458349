import fp from 'fastify-plugin'
import helmet from '@fastify/helmet'
import type { FastifyInstance } from 'fastify'
import type { FastifyHelmetOptions } from '@fastify/helmet'

// JSON API only, so no CSP or cross-origin policies to tune
const createHelmetConfig = (): FastifyHelmetOptions => ({
  global: true,
  contentSecurityPolicy: false,
  hsts: false,
  hidePoweredBy: true,
  noSniff: true,
  frameguard: {
    action: 'deny',
  },
})

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(helmet, createHelmetConfig())
  },
  {
    name: 'helmet-plugin',
    dependencies: ['config'],
  },
)
