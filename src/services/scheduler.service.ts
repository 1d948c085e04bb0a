/**
 * Scheduler Service
 *
 * Runs the periodic jobs of the service on toad-scheduler interval jobs. A
 * job never overlaps itself; a run that outlasts its interval delays the
 * next one instead.
 *
 * Responsible for:
 * - Registering named interval jobs
 * - Logging job failures without stopping the schedule
 * - Tracking the last run of every job
 *
 * @example
 * const scheduler = new SchedulerService(log)
 * scheduler.scheduleJob('my-job', { seconds: 30 }, async () => {
 *   // Job implementation
 * })
 */
import type {
  IntervalConfig,
  JobRunInfo,
  JobStatus,
} from '@root/types/scheduler.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

interface RegisteredJob {
  job: SimpleIntervalJob
  handler: JobHandler
  config: IntervalConfig
  running: boolean
  lastRun: JobRunInfo | null
}

export class SchedulerService {
  private readonly log: FastifyBaseLogger
  private readonly scheduler = new ToadScheduler()
  private readonly jobs = new Map<string, RegisteredJob>()

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
  }

  /**
   * Registers a job and starts its schedule, replacing any job of that name.
   *
   * @returns false when the interval is empty and nothing was scheduled
   */
  scheduleJob(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): boolean {
    if (intervalSeconds(config) <= 0) {
      this.log.warn(`Job ${name} has no interval, not scheduling it`)
      return false
    }

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }

    const registered: RegisteredJob = {
      job: this.createJob(name, config),
      handler,
      config,
      running: false,
      lastRun: null,
    }
    this.jobs.set(name, registered)
    this.scheduler.addSimpleIntervalJob(registered.job)

    this.log.info(
      `Job ${name} scheduled every ${intervalSeconds(config)} seconds`,
    )
    return true
  }

  getJobStatuses(): JobStatus[] {
    return Array.from(this.jobs, ([name, registered]) => ({
      name,
      intervalSeconds: intervalSeconds(registered.config),
      running: registered.running,
      lastRun: registered.lastRun,
    }))
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
  }

  private createJob(name: string, config: IntervalConfig): SimpleIntervalJob {
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        await this.execute(name)
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    return new SimpleIntervalJob(
      {
        hours: config.hours,
        minutes: config.minutes,
        seconds: config.seconds,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      {
        id: name,
        preventOverrun: true,
      },
    )
  }

  /**
   * Runs the handler and records the outcome; failures are logged, never
   * rethrown, so the schedule keeps going.
   */
  private async execute(name: string): Promise<void> {
    const registered = this.jobs.get(name)
    if (!registered) {
      return
    }

    const startedAt = this.now()
    registered.running = true
    try {
      this.log.debug(`Running scheduled job: ${name}`)
      await registered.handler(name)
      registered.lastRun = {
        time: this.now(),
        status: 'completed',
        durationMs: this.now() - startedAt,
      }
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      registered.lastRun = {
        time: this.now(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
        durationMs: this.now() - startedAt,
      }
    } finally {
      registered.running = false
    }
  }
}

function intervalSeconds(config: IntervalConfig): number {
  return (
    (config.hours ?? 0) * 3600 +
    (config.minutes ?? 0) * 60 +
    (config.seconds ?? 0)
  )
}
