/**
 * Daily post job on node-cron. Explicit lifecycle: nothing is scheduled until start(),
 * stop() cancels the cron task. A failed scheduled run is logged and reported, never thrown.
 */
import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import type { Logger } from 'pino'
import { getLogger, errorMessage } from '../lib/logger'
import { captureJobError } from '../lib/sentry'

export const DAILY_JOB_ID = 'daily_blog_post'
export const DAILY_JOB_NAME = 'Generate Daily Blog Post'

export interface DailySchedule {
  hour: number
  minute: number
}

export interface ScheduledJobStatus {
  id: string
  name: string
  next_run: string | null
  trigger: string
}

export interface SchedulerStatus {
  scheduler_running: boolean
  jobs: ScheduledJobStatus[]
}

export function cronExpression(schedule: DailySchedule): string {
  return `${schedule.minute} ${schedule.hour} * * *`
}

/** Next local-time occurrence of hour:minute strictly after `from`. */
export function nextDailyRun(schedule: DailySchedule, from: Date): Date {
  const next = new Date(from)
  next.setHours(schedule.hour, schedule.minute, 0, 0)
  if (next.getTime() <= from.getTime()) {
    next.setDate(next.getDate() + 1)
    next.setHours(schedule.hour, schedule.minute, 0, 0)
  }
  return next
}

export interface DailyPostSchedulerOptions {
  logger?: Logger
  now?: () => Date
}

export class DailyPostScheduler {
  private task: ScheduledTask | null = null
  private readonly log: Logger
  private readonly now: () => Date

  constructor(
    private readonly job: (log: Logger) => Promise<string>,
    private readonly schedule: DailySchedule,
    options: DailyPostSchedulerOptions = {}
  ) {
    this.log = options.logger ?? getLogger('scheduler')
    this.now = options.now ?? (() => new Date())
  }

  start(): void {
    if (this.task) return
    const expression = cronExpression(this.schedule)
    this.task = cron.schedule(expression, async () => {
      await this.runScheduled()
    })
    this.log.info({ msg: 'Daily scheduler started', jobId: DAILY_JOB_ID, cron: expression })
  }

  stop(): void {
    if (!this.task) return
    this.task.stop()
    this.task = null
    this.log.info({ msg: 'Daily scheduler stopped', jobId: DAILY_JOB_ID })
  }

  isRunning(): boolean {
    return this.task !== null
  }

  status(): SchedulerStatus {
    const running = this.isRunning()
    return {
      scheduler_running: running,
      jobs: [
        {
          id: DAILY_JOB_ID,
          name: DAILY_JOB_NAME,
          next_run: running ? nextDailyRun(this.schedule, this.now()).toISOString() : null,
          trigger: `cron[${cronExpression(this.schedule)}]`,
        },
      ],
    }
  }

  /** Run the job immediately; errors propagate to the caller. */
  runNow(): Promise<string> {
    return this.job(this.log.child({ trigger: 'manual' }))
  }

  /** Cron tick. */
  async runScheduled(): Promise<void> {
    const log = this.log.child({ jobId: DAILY_JOB_ID, trigger: 'cron' })
    try {
      const file = await this.job(log)
      log.info({ msg: 'Scheduled run finished', file })
    } catch (err) {
      log.error({ msg: 'Error in daily blog post generation', error: errorMessage(err) })
      captureJobError(DAILY_JOB_ID, DAILY_JOB_NAME, err)
    }
  }
}
