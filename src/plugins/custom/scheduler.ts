import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export default fp(
  async function scheduler(fastify: FastifyInstance) {
    const service = new SchedulerService(fastify.log)

    fastify.decorate('scheduler', service)

    fastify.addHook('onClose', async () => {
      service.stop()
    })
  },
  {
    name: 'scheduler',
  },
)
