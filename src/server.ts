import { createLoggerConfig, validLogLevels } from '@utils/logger.js'
import closeWithGrace from 'close-with-grace'
import Fastify, { type FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import serviceApp, { options } from './app.js'

/**
 * Build the Fastify instance with every plugin loaded and the configured
 * log level applied. Used by both the HTTP server and the one-shot CLI run.
 */
export async function createApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: createLoggerConfig(),
    ...options,
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }
  return app
}

/**
 * Start the HTTP server with graceful shutdown handling
 */
export async function startServer(): Promise<void> {
  const app = await createApp()

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
