import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { isSyncError } from '@utils/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Global error handler plugin.
 * Sync errors answer with their own status and code; anything else falls
 * back to the Fastify error's status.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = isSyncError(err) ? err.statusCode : (err.statusCode ?? 500)
    // Avoid logging query/params to prevent leaking tokens/PII
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)

    // Sync failures are safe to describe: they carry no secrets
    const exposeMessage = statusCode < 500 || isSyncError(err)
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isSyncError(err)
        ? err.name
        : statusCode >= 500
          ? 'Internal Server Error'
          : 'error' in err && typeof err.error === 'string'
            ? err.error
            : 'Client Error',
      message: exposeMessage
        ? err.message || 'An error occurred'
        : 'Internal Server Error',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
