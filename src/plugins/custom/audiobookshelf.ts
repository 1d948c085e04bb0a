import { AudiobookshelfClient } from '@services/audiobookshelf.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    audiobookshelf: AudiobookshelfClient
  }
}

export default fp(
  async function audiobookshelf(fastify: FastifyInstance) {
    const { config } = fastify
    const client = new AudiobookshelfClient(fastify.log, {
      baseUrl: config.absBaseUrl,
      token: config.absToken,
      userId: config.absUserId,
      libraryId: config.absLibraryId,
      requestTimeoutMs: config.requestTimeoutSeconds * 1000,
      dryRun: config.dryRun,
    })
    await client.initialize()

    fastify.decorate('audiobookshelf', client)
  },
  {
    name: 'audiobookshelf',
    dependencies: ['config'],
  },
)
