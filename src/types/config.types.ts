import type { ImportMode } from './import.types.js'

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Storage
  csvDir: string
  // Trakt Config
  traktApiUrl: string
  traktClientId: string
  traktAccessToken: string
  traktPageSize: number
  traktTimeoutMs: number
  fetchMaxAttempts: number
  fetchRetryBaseDelayMs: number
  // Reconciliation
  ratingScaleMax: number
  collapseSameDayDuplicates: boolean
  // Scheduling
  scheduledSync: boolean
  syncIntervalHours: number
  // Import
  importMode: ImportMode
  importWebhookUrl: string
  importWebhookConcurrency: number
}
