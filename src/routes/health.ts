import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

/** Missed passes tolerated before the service reports itself lagging */
const LAG_INTERVALS = 3
const LAG_GRACE_SECONDS = 60

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        response: {
          200: HealthCheckResponseSchema,
        },
      },
    },
    async () => {
      const now = Date.now()
      const timestamp = new Date(now).toISOString()
      const store = fastify.syncState
      const lastSync = store.getLastSuccessfulSync()

      if (!store.isLoaded || lastSync === 0) {
        return { status: 'starting', timestamp, lastSyncAgeSeconds: null }
      }

      const lastSyncAgeSeconds = Math.max(0, (now - lastSync) / 1000)
      const threshold =
        fastify.config.syncIntervalSeconds * LAG_INTERVALS + LAG_GRACE_SECONDS

      return {
        status: lastSyncAgeSeconds > threshold ? 'lagging' : 'ok',
        timestamp,
        lastSyncAgeSeconds,
      }
    },
  )
}

export default plugin
