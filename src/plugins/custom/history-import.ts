import type { ImportAdapter } from '@root/types/import.types.js'
import { createImportAdapter } from '@services/importers/index.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    historyImporter: ImportAdapter
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const importer = createImportAdapter(fastify.log, fastify.config, fastify.csvDir)
    fastify.log.info(`Using the ${importer.name} importer`)

    fastify.decorate('historyImporter', importer)
  },
  {
    name: 'history-import',
    dependencies: ['config', 'history-store'],
  },
)
