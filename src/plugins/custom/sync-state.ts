/**
 * Sync State Plugin
 *
 * Loads the persisted sync state before anything else touches it and
 * writes one final snapshot when the server shuts down.
 */
import { SyncStateStore } from '@services/sync-state.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    syncState: SyncStateStore
  }
}

export default fp(
  async function syncState(fastify: FastifyInstance) {
    const store = new SyncStateStore(fastify.log, {
      statePath: fastify.config.statePath,
      persistEnabled: fastify.config.persistEnabled,
      watchlistMaxSize: fastify.config.watchlistMaxSize,
    })
    await store.load()

    fastify.decorate('syncState', store)

    fastify.addHook('onClose', async () => {
      // Queued behind any pass still committing
      await store.exclusive(() => store.save())
    })
  },
  {
    name: 'sync-state',
    dependencies: ['config'],
  },
)
