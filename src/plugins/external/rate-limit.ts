import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import fp from 'fastify-plugin'

/** Probed by orchestrators and scrapers at their own pace */
const UNLIMITED_PATHS = new Set(['/health', '/metrics'])

const createRateLimitConfig = (fastify: FastifyInstance) => {
  return {
    max: fastify.config.rateLimitMax,
    timeWindow: '1 minute',
    allowList: (req: FastifyRequest) => {
      // Use pathname only to prevent query string manipulation bypasses
      const pathname = req.url.split('?')[0]
      return UNLIMITED_PATHS.has(pathname)
    },
  }
}

/**
 * Low overhead rate limiter for routes.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, createRateLimitConfig(fastify))
  },
  {
    name: 'rate-limit',
    dependencies: ['config'],
  },
)
