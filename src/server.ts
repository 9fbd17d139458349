import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp, { options } from './app.js'
import { createLoggerConfig, validLogLevels } from '@utils/logger.js'

/**
 * Initializes and starts the Fastify server with configured plugins, logging, and graceful shutdown handling.
 *
 * Persistent connections (the repost SSE stream) are force-closed on shutdown.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    ...options,
    pluginTimeout: 60000,
    // Force close persistent connections (like SSE) during shutdown
    forceCloseConnections: true,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '0.0.0.0',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

init()
