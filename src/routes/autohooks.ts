import { timingSafeEqual } from 'node:crypto'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { FastifyInstance } from 'fastify'

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected)
  const b = Buffer.from(provided)
  return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * Guards the `/v1` API with the shared `X-Token` header when a token is
 * configured. Health and metrics stay open.
 */
export default async function (fastify: FastifyInstance) {
  const expected = fastify.config.httpServerToken

  fastify.addHook('onRequest', async (request, reply) => {
    if (!expected) {
      return
    }

    const urlWithoutQuery = request.url.split('?')[0]
    if (!urlWithoutQuery.startsWith('/v1/') && urlWithoutQuery !== '/v1') {
      return
    }

    const provided = request.headers['x-token']
    if (typeof provided === 'string' && tokensMatch(expected, provided)) {
      return
    }

    request.log.warn(
      { request: { id: request.id, path: urlWithoutQuery } },
      'Rejected request with missing or invalid token',
    )
    const payload: ErrorResponse = {
      statusCode: 401,
      code: 'UNAUTHORIZED',
      error: 'Unauthorized',
      message: 'Invalid token',
    }
    return reply.code(401).send(payload)
  })
}
