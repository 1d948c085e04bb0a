import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig } from '@utils/logger.js'

/**
 * Boots the application and keeps it running until a shutdown signal.
 *
 * The periodic jobs run whether or not the HTTP surface is enabled; the port
 * is only opened when it is. Shutdown stops the jobs and flushes the state.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
    forceCloseConnections: true,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err, signal }) => {
      if (err != null) {
        app.log.error(err)
      } else if (signal) {
        app.log.info(`Received ${signal}, shutting down`)
      }
      await app.close()
    },
  )

  if (!app.config.httpServerEnabled) {
    app.log.info('HTTP server disabled, running background sync only')
    return
  }

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

init().catch((error: unknown) => {
  console.error('Failed to start listening-sync', error)
  process.exit(1)
})
