import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'

const schema = {
  type: 'object',
  required: ['port', 'userPubkey'],
  properties: {
    port: {
      type: 'number',
      default: 3005,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    dbPath: {
      type: 'string',
      default: './data/db/repost-sync.db',
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    gatewayUrl: {
      type: 'string',
      default: 'http://localhost:7777',
    },
    gatewayApiKey: {
      type: 'string',
      default: '',
    },
    gatewayTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 15000,
    },
    userPubkey: {
      type: 'string',
      minLength: 1,
    },
    startAuthenticated: {
      type: 'boolean',
      default: true,
    },
    repostFetchLimit: {
      type: 'number',
      minimum: 1,
      default: 500,
    },
    repostTargetKind: {
      type: 'number',
      default: 34236,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    fastify.log.debug(
      {
        dbPath: fastify.config.dbPath,
        gatewayUrl: fastify.config.gatewayUrl,
        repostFetchLimit: fastify.config.repostFetchLimit,
      },
      'Configuration loaded',
    )
  },
  {
    name: 'config',
  },
)
