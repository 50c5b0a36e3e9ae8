import { CsvHistoryStore } from '@services/history-store/index.js'
import { resolveCsvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    historyStore: CsvHistoryStore
    /** Resolved directory of the history CSV files */
    csvDir: string
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const csvDir = resolveCsvPath(fastify.config.csvDir)
    fastify.log.info(`History files are kept in ${csvDir}`)

    fastify.decorate('csvDir', csvDir)
    fastify.decorate('historyStore', new CsvHistoryStore(fastify.log, csvDir))
  },
  {
    name: 'history-store',
    dependencies: ['config'],
  },
)
