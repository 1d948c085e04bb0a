import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

/**
 * Route schemas are zod schemas; requests are validated and replies
 * serialized through them.
 *
 * @see {@link https://github.com/turkerdev/fastify-type-provider-zod}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)
  },
  {
    name: 'type-provider',
  },
)
