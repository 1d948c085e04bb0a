import {
  type StatusResponse,
  StatusResponseSchema,
} from '@schemas/status/status.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: StatusResponse
  }>(
    '/',
    {
      schema: {
        response: {
          200: StatusResponseSchema,
          401: ErrorSchema,
        },
      },
    },
    async () => {
      const summary = fastify.syncState.getSummary()
      const { config } = fastify

      return {
        watchlistSize: summary.watchlistSize,
        trackedItems: summary.trackedItems,
        lastSuccessfulSync: summary.lastSuccessfulSync,
        lastDeepScan: summary.lastDeepScan,
        lastLibraryDiscovery: summary.lastLibraryDiscovery,
        readOnly: summary.readOnly,
        clients: {
          audible: fastify.audible.isReady(),
          audiobookshelf: fastify.audiobookshelf.isReady(),
        },
        config: {
          intervalSeconds: config.syncIntervalSeconds,
          mode: config.syncMode,
          dryRun: config.dryRun,
        },
        jobs: fastify.scheduler.getJobStatuses(),
      }
    },
  )
}

export default plugin
