import { HistorySyncService } from '@services/history-sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    historySync: HistorySyncService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const historySync = new HistorySyncService(
      fastify.log,
      {
        fetcher: fastify.trakt,
        store: fastify.historyStore,
        importer: fastify.historyImporter,
      },
      {
        ratingScaleMax: config.ratingScaleMax,
        collapseSameDayDuplicates: config.collapseSameDayDuplicates,
        fetchMaxAttempts: config.fetchMaxAttempts,
        fetchRetryBaseDelayMs: config.fetchRetryBaseDelayMs,
      },
    )

    fastify.decorate('historySync', historySync)
  },
  {
    name: 'history-sync',
    dependencies: ['config', 'trakt', 'history-store', 'history-import'],
  },
)
