import fp from 'fastify-plugin'
import fastifySwagger from '@fastify/swagger'
import {
  serializerCompiler,
  validatorCompiler,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'
import type { FastifyInstance } from 'fastify'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  return {
    openapi: {
      info: {
        title: 'Repost Sync API',
        description:
          'Reposting of addressable content and reconciliation of the local repost cache with the relay network',
        version: 'V1',
      },
      servers: [
        {
          url: `http://localhost:${fastify.config.port}`,
          description: 'Localhost Access (with port)',
        },
      ],
      tags: [
        {
          name: 'Reposts',
          description: 'Repost, unrepost, sync and repost counts',
        },
        {
          name: 'Session',
          description: 'Local session state',
        },
        {
          name: 'System',
          description: 'Health checks',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * Register Swagger with combined config
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
