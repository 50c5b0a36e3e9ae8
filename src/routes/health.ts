import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns the health status of the service and whether a history sync is running. Used by Docker HEALTHCHECK and orchestrators.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const storageOk = await fastify.historyStore.isWritable()
      const statusCode = storageOk ? 200 : 503

      return reply.status(statusCode).send({
        status: storageOk ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        checks: {
          storage: storageOk ? 'ok' : 'failed',
          sync: fastify.historySync.isRunning ? 'running' : 'idle',
        },
      })
    },
  )
}

export default plugin
