import { HISTORY_SYNC_JOB } from '@plugins/custom/scheduler.js'
import {
  ErrorSchema,
  type SyncRunResult,
  SyncRunResultSchema,
  type SyncSchedule,
  SyncScheduleSchema,
} from '@schemas/sync/sync.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  // Run one history sync and wait for it to finish
  fastify.post<{
    Reply: SyncRunResult
  }>(
    '/run',
    {
      schema: {
        summary: 'Run history sync',
        operationId: 'runHistorySync',
        description:
          'Fetch the Trakt history, reconcile it against the stored history and import the new records',
        response: {
          200: SyncRunResultSchema,
          409: ErrorSchema,
          422: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async () => {
      // Failures propagate to the error handler, which maps sync error codes
      return fastify.historySync.run()
    },
  )

  // Outcome of the last run
  fastify.get<{
    Reply: SyncRunResult
  }>(
    '/status',
    {
      schema: {
        summary: 'Get last sync result',
        operationId: 'getHistorySyncStatus',
        description: 'Returns the outcome of the most recent history sync',
        response: {
          200: SyncRunResultSchema,
          404: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (_request, reply) => {
      const result = fastify.historySync.lastResult
      if (!result) {
        return reply.notFound('No history sync has run yet')
      }
      return result
    },
  )

  // Interval job state when scheduledSync is on
  fastify.get<{
    Reply: SyncSchedule
  }>(
    '/schedule',
    {
      schema: {
        summary: 'Get sync schedule',
        operationId: 'getHistorySyncSchedule',
        description:
          'Returns the interval, last run and next run of the scheduled history sync',
        response: {
          200: SyncScheduleSchema,
          404: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (_request, reply) => {
      const status = fastify.scheduler.getJobStatus(HISTORY_SYNC_JOB)
      if (!status) {
        return reply.notFound('Scheduled history sync is disabled')
      }
      return status
    },
  )
}

export default plugin
