export {
  HistoryFormatError,
  parseHistory,
  serializeHistory,
  serializeIncrementalExport,
  serializeLetterboxdImport,
  serializeRatingsSnapshot,
  serializeWatchedSnapshot,
} from './csv-format.js'
export {
  CsvHistoryStore,
  EXPORT_FILE,
  FAILED_IMPORT_FILE,
  HISTORY_FILE,
  RATINGS_SNAPSHOT_FILE,
  WATCHED_SNAPSHOT_FILE,
} from './csv-history-store.js'
