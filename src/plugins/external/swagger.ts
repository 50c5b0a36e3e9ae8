import fastifySwagger from '@fastify/swagger'
import apiReference from '@scalar/fastify-api-reference'
import { APP_VERSION } from '@utils/version.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  return {
    openapi: {
      info: {
        title: 'Trakt to Letterboxd Sync API',
        description:
          'Runs the watch history sync and reports the outcome of the last run',
        version: APP_VERSION,
      },
      servers: [
        {
          url: `http://localhost:${fastify.config.port}`,
          description: 'Localhost Access (with port)',
        },
      ],
      tags: [
        {
          name: 'Sync',
          description: 'History sync endpoints',
        },
        {
          name: 'System',
          description: 'Health and status endpoints',
        },
      ],
    },
    hideUntagged: true,
    exposeRoute: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))

    await fastify.register(apiReference, {
      routePrefix: '/api/docs',
    })
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
