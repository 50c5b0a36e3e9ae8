import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export const HISTORY_SYNC_JOB = 'history-sync'

/**
 * Scheduler plugin. With `scheduledSync` on, the history sync runs every
 * `syncIntervalHours` once the server is ready.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(fastify.log)
    fastify.decorate('scheduler', scheduler)

    fastify.addHook('onReady', async () => {
      if (!fastify.config.scheduledSync) {
        fastify.log.info('Scheduled history sync is disabled')
        return
      }
      scheduler.scheduleJob(
        HISTORY_SYNC_JOB,
        { hours: fastify.config.syncIntervalHours },
        async (jobName) => {
          fastify.log.info(`Starting scheduled history sync: ${jobName}`)
          await fastify.historySync.run()
        },
      )
    })

    fastify.addHook('onClose', async () => {
      scheduler.stop()
    })
  },
  {
    name: 'scheduler',
    dependencies: ['config', 'history-sync'],
  },
)
