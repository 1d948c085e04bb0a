import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import { SYNC_MODES, type Config } from '@root/types/config.types.js'
import { resolveEnvPath, resolveStatePath } from '@utils/data-dir.js'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'integer',
      default: 8080,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'integer',
      minimum: 0,
      default: 10000,
    },
    rateLimitMax: {
      type: 'integer',
      minimum: 1,
      default: 500,
    },
    httpServerEnabled: {
      type: 'boolean',
      default: false,
    },
    httpServerToken: {
      type: 'string',
      default: '',
    },
    requestTimeoutSeconds: {
      type: 'number',
      default: 30,
    },
    dryRun: {
      type: 'boolean',
      default: false,
    },
    absBaseUrl: {
      type: 'string',
      default: '',
    },
    absToken: {
      type: 'string',
      default: '',
    },
    absUserId: {
      type: 'string',
      default: '',
    },
    absLibraryId: {
      type: 'string',
      default: '',
    },
    audibleLocale: {
      type: 'string',
      default: 'us',
    },
    audibleAuthPath: {
      type: 'string',
      default: './data/audible_session.json',
    },
    audibleAuthJsonB64: {
      type: 'string',
      default: '',
    },
    audibleBatchSize: {
      type: 'integer',
      minimum: 1,
      default: 20,
    },
    audibleLibraryDiscoveryIntervalSeconds: {
      type: 'number',
      default: 21600,
    },
    audibleDeepScanIntervalSeconds: {
      type: 'number',
      default: 86400,
    },
    deepScanMaxInProgress: {
      type: 'integer',
      minimum: 1,
      default: 200,
    },
    audibleRecentlyPlayedLimit: {
      type: 'integer',
      minimum: 0,
      default: 10,
    },
    statePath: {
      type: 'string',
      default: resolveStatePath(),
    },
    persistEnabled: {
      type: 'boolean',
      default: true,
    },
    syncIntervalSeconds: {
      type: 'number',
      default: 120,
    },
    syncToleranceSeconds: {
      type: 'number',
      default: 5,
    },
    syncCooldownSeconds: {
      type: 'number',
      default: 60,
    },
    syncConflictMinTimeDeltaSeconds: {
      type: 'number',
      default: 30,
    },
    watchlistMaxSize: {
      type: 'integer',
      minimum: 1,
      default: 500,
    },
    syncMode: {
      type: 'string',
      enum: [...SYNC_MODES],
      default: 'bidirectional',
    },
    fetchConcurrency: {
      type: 'integer',
      minimum: 1,
      default: 4,
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

    // Trailing slashes would double up when joined with API paths
    fastify.config.absBaseUrl = fastify.config.absBaseUrl.replace(/\/+$/, '')

    fastify.log.debug(
      {
        syncMode: fastify.config.syncMode,
        syncIntervalSeconds: fastify.config.syncIntervalSeconds,
        persistEnabled: fastify.config.persistEnabled,
        dryRun: fastify.config.dryRun,
      },
      'Configuration loaded',
    )
  },
  {
    name: 'config',
  },
)
