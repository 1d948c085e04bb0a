import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyBaseLogger } from 'fastify'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

const NOW = Date.UTC(2024, 9, 12, 7, 0)

describe('SchedulerService', () => {
  let logger: FastifyBaseLogger
  let scheduler: SchedulerService

  beforeEach(() => {
    logger = createMockLogger()
    scheduler = new SchedulerService(logger, () => NOW)
  })

  afterEach(() => {
    scheduler.stop()
    vi.useRealTimers()
  })

  it('refuses a job without an interval', () => {
    const scheduled = scheduler.scheduleJob('empty', {}, vi.fn())

    expect(scheduled).toBe(false)
    expect(scheduler.getJobStatuses()).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith(
      'Job empty has no interval, not scheduling it',
    )
  })

  it('reports the combined interval of a scheduled job', () => {
    scheduler.scheduleJob('sync', { minutes: 1, seconds: 30 }, vi.fn())

    expect(scheduler.getJobStatuses()).toEqual([
      { name: 'sync', intervalSeconds: 90, running: false, lastRun: null },
    ])
  })

  it('replaces a job registered under the same name', () => {
    scheduler.scheduleJob('sync', { seconds: 30 }, vi.fn())
    scheduler.scheduleJob('sync', { hours: 1 }, vi.fn())

    expect(scheduler.getJobStatuses()).toEqual([
      { name: 'sync', intervalSeconds: 3600, running: false, lastRun: null },
    ])
  })

  it('runs a job immediately when asked and records the run', async () => {
    const handler = vi.fn().mockResolvedValue(undefined)
    scheduler.scheduleJob('sync', { hours: 1, runImmediately: true }, handler)

    await vi.waitFor(() => {
      expect(scheduler.getJobStatuses()[0].lastRun).toEqual({
        time: NOW,
        status: 'completed',
        durationMs: 0,
      })
    })
    expect(handler).toHaveBeenCalledWith('sync')
  })

  it('records a failing run without throwing', async () => {
    scheduler.scheduleJob(
      'sync',
      { hours: 1, runImmediately: true },
      vi.fn().mockRejectedValue(new Error('remote unavailable')),
    )

    await vi.waitFor(() => {
      expect(scheduler.getJobStatuses()[0].lastRun).toEqual({
        time: NOW,
        status: 'failed',
        error: 'remote unavailable',
        durationMs: 0,
      })
    })
    expect(logger.error).toHaveBeenCalledWith(
      { error: expect.any(Error) },
      'Error in job sync',
    )
  })

  it('runs the job once per interval', async () => {
    vi.useFakeTimers()
    const handler = vi.fn().mockResolvedValue(undefined)
    scheduler.scheduleJob('sync', { seconds: 30 }, handler)

    await vi.advanceTimersByTimeAsync(60_000)

    expect(handler).toHaveBeenCalledTimes(2)
  })

  it('does not start a run while the previous one is in flight', async () => {
    vi.useFakeTimers()
    let release: () => void = () => {}
    const handler = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve
        }),
    )
    scheduler.scheduleJob('sync', { seconds: 30 }, handler)

    await vi.advanceTimersByTimeAsync(90_000)

    expect(handler).toHaveBeenCalledTimes(1)
    expect(scheduler.getJobStatuses()[0].running).toBe(true)

    release()

    await vi.waitFor(() => {
      expect(scheduler.getJobStatuses()[0].running).toBe(false)
    })
  })
})
