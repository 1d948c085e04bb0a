/**
 * Progress Sync Plugin
 *
 * Wires the reconciliation engine and the sync driver to the clients and
 * the state store, then schedules the sync and discovery jobs once the
 * server is ready.
 */
import { ProgressSyncService } from '@services/progress-sync.service.js'
import { buildReconciliationConfig } from '@services/reconciliation/index.js'
import { ReconciliationEngine } from '@services/reconciliation.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/** How often the discovery job checks whether a scan is due */
const DISCOVERY_CHECK_SECONDS = 60

declare module 'fastify' {
  interface FastifyInstance {
    progressSync: ProgressSyncService
  }
}

export default fp(
  async function progressSync(fastify: FastifyInstance) {
    const { config } = fastify
    const engine = new ReconciliationEngine(
      fastify.log,
      fastify.syncState,
      buildReconciliationConfig(config),
    )
    const service = new ProgressSyncService(
      fastify.log,
      fastify.syncState,
      engine,
      fastify.audible,
      fastify.audiobookshelf,
      {
        recentlyPlayedLimit: config.audibleRecentlyPlayedLimit,
        deepScanIntervalMs: config.audibleDeepScanIntervalSeconds * 1000,
        discoveryIntervalMs:
          config.audibleLibraryDiscoveryIntervalSeconds * 1000,
        fetchConcurrency: config.fetchConcurrency,
      },
    )

    fastify.decorate('progressSync', service)

    fastify.addHook('onReady', async () => {
      if (config.dryRun) {
        fastify.log.warn('Dry run enabled, positions will not be written')
      }
      fastify.log.info(
        `Sync mode ${config.syncMode}, every ${config.syncIntervalSeconds}s`,
      )

      fastify.scheduler.scheduleJob(
        'progress-sync',
        { seconds: config.syncIntervalSeconds, runImmediately: true },
        async () => {
          await service.runSyncPass()
        },
      )

      fastify.scheduler.scheduleJob(
        'library-discovery',
        { seconds: DISCOVERY_CHECK_SECONDS, runImmediately: true },
        async () => {
          const result = await service.runDiscoveryPass()
          if (result.deepScanned !== null || result.discovered !== null) {
            fastify.log.debug(result, 'Library discovery completed')
          }
        },
      )
    })
  },
  {
    name: 'progress-sync',
    dependencies: [
      'config',
      'sync-state',
      'audible',
      'audiobookshelf',
      'scheduler',
    ],
  },
)
