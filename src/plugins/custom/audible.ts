import { AudibleClient } from '@services/audible.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    audible: AudibleClient
  }
}

export default fp(
  async function audible(fastify: FastifyInstance) {
    const { config } = fastify
    const client = new AudibleClient(fastify.log, {
      locale: config.audibleLocale,
      authPath: config.audibleAuthPath,
      authJsonB64: config.audibleAuthJsonB64,
      batchSize: config.audibleBatchSize,
      deepScanMaxInProgress: config.deepScanMaxInProgress,
      fetchConcurrency: config.fetchConcurrency,
      requestTimeoutMs: config.requestTimeoutSeconds * 1000,
      dryRun: config.dryRun,
    })
    await client.initialize()

    fastify.decorate('audible', client)
  },
  {
    name: 'audible',
    dependencies: ['config'],
  },
)
