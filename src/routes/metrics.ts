import type { FastifyPluginAsync } from 'fastify'

const PREFIX = 'listening_sync'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get('/metrics', async (_request, reply) => {
    const summary = fastify.syncState.getSummary()
    const lines = [
      `# HELP ${PREFIX}_watchlist_size Identifiers on the watchlist`,
      `# TYPE ${PREFIX}_watchlist_size gauge`,
      `${PREFIX}_watchlist_size ${summary.watchlistSize}`,
      `# HELP ${PREFIX}_items_tracked Items with a stored sync status`,
      `# TYPE ${PREFIX}_items_tracked gauge`,
      `${PREFIX}_items_tracked ${summary.trackedItems}`,
      `# HELP ${PREFIX}_last_sync_timestamp_seconds Completion time of the last sync pass`,
      `# TYPE ${PREFIX}_last_sync_timestamp_seconds gauge`,
      `${PREFIX}_last_sync_timestamp_seconds ${summary.lastSuccessfulSync / 1000}`,
      `# HELP ${PREFIX}_state_read_only Whether persistence was disabled after a failed write`,
      `# TYPE ${PREFIX}_state_read_only gauge`,
      `${PREFIX}_state_read_only ${summary.readOnly ? 1 : 0}`,
    ]

    return reply
      .type('text/plain; version=0.0.4')
      .send(`${lines.join('\n')}\n`)
  })
}

export default plugin
