import env from '@fastify/env'
import {
  ConfigSchema,
  formatConfigIssues,
} from '@schemas/config/config.schema.js'
import type { Config } from '@root/types/config.types.js'
import { resolveEnvPath } from '@utils/data-dir.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3004,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    // Empty means {dataDir}/csv
    csvDir: {
      type: 'string',
      default: '',
    },
    traktApiUrl: {
      type: 'string',
      default: 'https://api.trakt.tv',
    },
    traktClientId: {
      type: 'string',
      default: '',
    },
    traktAccessToken: {
      type: 'string',
      default: '',
    },
    traktPageSize: {
      type: 'number',
      default: 100,
    },
    traktTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    fetchMaxAttempts: {
      type: 'number',
      default: 3,
    },
    fetchRetryBaseDelayMs: {
      type: 'number',
      default: 1000,
    },
    ratingScaleMax: {
      type: 'number',
      default: 5,
    },
    collapseSameDayDuplicates: {
      type: 'boolean',
      default: false,
    },
    scheduledSync: {
      type: 'boolean',
      default: false,
    },
    syncIntervalHours: {
      type: 'number',
      default: 24,
    },
    importMode: {
      type: 'string',
      enum: ['csv', 'webhook'],
      default: 'csv',
    },
    importWebhookUrl: {
      type: 'string',
      default: '',
    },
    importWebhookConcurrency: {
      type: 'number',
      default: 2,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: resolveEnvPath(),
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    // Defaults and coercion come from the JSON schema above; cross-field
    // rules are checked here so a bad combination fails at startup.
    const result = ConfigSchema.safeParse(fastify.config)
    if (!result.success) {
      throw new Error(`Invalid configuration: ${formatConfigIssues(result.error)}`)
    }
    fastify.config = result.data
  },
  {
    name: 'config',
  },
)
