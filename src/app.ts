import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const srcDir = path.dirname(fileURLToPath(import.meta.url))

export const options = {
  ajv: {
    customOptions: {
      coerceTypes: 'array' as const,
      removeAdditional: 'all' as const,
    },
  },
}

/**
 * Registers the external plugins (config, rate limiting, docs), the custom
 * plugins that wire the sync services, and the HTTP routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'routes'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
