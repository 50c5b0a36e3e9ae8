import { TraktService } from '@services/trakt.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    trakt: TraktService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const traktService = new TraktService(fastify.log, {
      apiUrl: config.traktApiUrl,
      clientId: config.traktClientId,
      accessToken: config.traktAccessToken,
      pageSize: config.traktPageSize,
      timeoutMs: config.traktTimeoutMs,
    })

    if (!config.traktClientId || !config.traktAccessToken) {
      fastify.log.warn(
        'Trakt credentials are not configured; sync runs will fail until traktClientId and traktAccessToken are set',
      )
    }

    fastify.decorate('trakt', traktService)
  },
  {
    name: 'trakt',
    dependencies: ['config'],
  },
)
