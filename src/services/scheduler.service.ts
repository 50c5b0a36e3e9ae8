/**
 * Scheduler Service
 *
 * Interval job scheduling on toad-scheduler. Schedules live in memory for
 * the lifetime of the process; each job keeps its last run outcome.
 *
 * @example
 * const scheduler = new SchedulerService(log)
 * scheduler.scheduleJob('history-sync', { hours: 24 }, async () => {
 *   await historySync.run()
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
  handler: JobHandler
  config: IntervalConfig
  lastRun: JobRunInfo | null
  nextRun: Date | null
}

function intervalMs(config: IntervalConfig): number {
  return (
    (config.days ?? 0) * 86_400_000 +
    (config.hours ?? 0) * 3_600_000 +
    (config.minutes ?? 0) * 60_000 +
    (config.seconds ?? 0) * 1000
  )
}

export class SchedulerService {
  private readonly scheduler = new ToadScheduler()
  private readonly jobs = new Map<string, RegisteredJob>()

  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'SCHEDULER')
  }

  constructor(private readonly baseLog: FastifyBaseLogger) {}

  /**
   * Schedule (or reschedule) an interval job. Overlapping executions of the
   * same job are skipped.
   */
  scheduleJob(name: string, config: IntervalConfig, handler: JobHandler): void {
    if (intervalMs(config) <= 0) {
      throw new Error(`Job ${name} needs a positive interval`)
    }
    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }

    const task = new AsyncTask(
      `${name}-task`,
      () => this.execute(name),
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )
    const job = new SimpleIntervalJob(
      {
        days: config.days,
        hours: config.hours,
        minutes: config.minutes,
        seconds: config.seconds,
        runImmediately: config.runImmediately ?? false,
      },
      task,
      { id: name, preventOverrun: true },
    )

    this.scheduler.addSimpleIntervalJob(job)
    this.jobs.set(name, {
      handler,
      config,
      lastRun: this.jobs.get(name)?.lastRun ?? null,
      nextRun: new Date(Date.now() + intervalMs(config)),
    })
    this.log.info(`Job ${name} scheduled successfully`)
  }

  getJobStatus(name: string): JobStatus | null {
    const entry = this.jobs.get(name)
    if (!entry) return null
    return {
      name,
      config: entry.config,
      lastRun: entry.lastRun,
      nextRun: entry.nextRun ? entry.nextRun.toISOString() : null,
    }
  }

  stop(): void {
    this.scheduler.stop()
    this.jobs.clear()
    this.log.info('Scheduler stopped')
  }

  private async execute(name: string): Promise<void> {
    const entry = this.jobs.get(name)
    if (!entry) return

    this.log.debug(`Running scheduled job: ${name}`)
    try {
      await entry.handler(name)
      entry.lastRun = { time: new Date().toISOString(), status: 'completed' }
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      entry.lastRun = {
        time: new Date().toISOString(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      }
    } finally {
      entry.nextRun = new Date(Date.now() + intervalMs(entry.config))
    }
  }
}
