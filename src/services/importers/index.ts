import type { Config } from '@root/types/config.types.js'
import type { ImportAdapter } from '@root/types/import.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { join } from 'node:path'
import { CsvDropImporter } from './csv-drop-importer.js'
import { WebhookImporter } from './webhook-importer.js'

export { CsvDropImporter, dropFileName } from './csv-drop-importer.js'
export {
  toWebhookPayload,
  WebhookImporter,
  type WebhookImporterOptions,
} from './webhook-importer.js'

/** Drop directory of the CSV importer, relative to the CSV directory */
export const IMPORT_DROP_DIR = 'imports'

/**
 * Importer selected by `importMode`
 */
export function createImportAdapter(
  log: FastifyBaseLogger,
  config: Pick<
    Config,
    'importMode' | 'importWebhookUrl' | 'importWebhookConcurrency'
  >,
  csvDir: string,
): ImportAdapter {
  switch (config.importMode) {
    case 'webhook':
      return new WebhookImporter(log, {
        url: config.importWebhookUrl,
        concurrency: config.importWebhookConcurrency,
      })
    case 'csv':
      return new CsvDropImporter(log, join(csvDir, IMPORT_DROP_DIR))
  }
}
