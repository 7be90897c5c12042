/**
 * Cron scheduler — one tick per minute, double-fire guard, start-up catch-up.
 */

import type Database from 'better-sqlite3'
import { BearingError, messageOf } from '../common/index.js'
import type { Result } from '../common/index.js'
import { describeHumanReadable, lastCronMatch, matchesCron, minuteKey, validateCron } from './cron.js'
import { JobRunRepository } from './job-runs.js'

const TICK_INTERVAL_MS = 60_000

export interface ScheduledJob {
  id: string
  cron: string
  /** Fire once at start-up when the latest match has no recorded run. */
  catchUp: boolean
  run(firedAt: Date): Promise<Result<unknown, BearingError>>
}

export interface SchedulerConfig {
  db: Database.Database
  timeZone: string
  jobs: ScheduledJob[]
  clock?: () => Date
  intervalMs?: number
}

export class Scheduler {
  private readonly runs: JobRunRepository
  private readonly clock: () => Date
  private readonly lastMinuteKey = new Map<string, string>()
  private interval: ReturnType<typeof setInterval> | null = null
  private running = false

  constructor(private readonly config: SchedulerConfig) {
    for (const job of config.jobs) {
      const error = validateCron(job.cron)
      if (error) throw BearingError.validation(`Job ${job.id} has an invalid cron "${job.cron}": ${error}`)
    }
    this.runs = new JobRunRepository(config.db)
    this.clock = config.clock ?? (() => new Date())
  }

  get isRunning(): boolean {
    return this.running
  }

  /** Runs any catch-up jobs, then starts ticking. Resolves to the ids caught up. */
  async start(): Promise<string[]> {
    if (this.running) return []
    this.running = true

    const caughtUp = await this.catchUp(this.clock())

    this.interval = setInterval(() => {
      this.tick().catch((err) => {
        console.error('[scheduler] Tick error:', err)
      })
    }, this.config.intervalMs ?? TICK_INTERVAL_MS)

    for (const job of this.config.jobs) {
      console.log(`[scheduler] ${job.id}: ${describeHumanReadable(job.cron)} (${this.config.timeZone})`)
    }
    console.log('[scheduler] Started')
    return caughtUp
  }

  stop(): void {
    this.running = false
    if (this.interval) {
      clearInterval(this.interval)
      this.interval = null
    }
    this.lastMinuteKey.clear()
    console.log('[scheduler] Stopped')
  }

  /** Fire every job whose cron matches `at`. Resolves to the ids fired. */
  async tick(at: Date = this.clock()): Promise<string[]> {
    if (!this.running) return []

    const mk = minuteKey(at, this.config.timeZone)
    const due = this.config.jobs.filter(
      (job) => this.lastMinuteKey.get(job.id) !== mk && matchesCron(job.cron, at, this.config.timeZone),
    )
    for (const job of due) {
      this.lastMinuteKey.set(job.id, mk)
    }

    await Promise.all(due.map((job) => this.execute(job, at)))
    return due.map((job) => job.id)
  }

  private async catchUp(at: Date): Promise<string[]> {
    const due: ScheduledJob[] = []
    for (const job of this.config.jobs) {
      if (!job.catchUp) continue

      const lastMatch = lastCronMatch(job.cron, at, this.config.timeZone)
      if (!lastMatch) continue

      const lastRun = this.runs.getLastRun(job.id)
      if (!lastRun.ok) {
        console.warn(`[scheduler] Catch-up check failed for ${job.id}: ${lastRun.error.message}`)
        continue
      }

      if (!lastRun.value || new Date(lastRun.value) < lastMatch) {
        console.log(`[scheduler] Catch-up: firing ${job.id}`)
        this.lastMinuteKey.set(job.id, minuteKey(lastMatch, this.config.timeZone))
        due.push(job)
      }
    }

    await Promise.all(due.map((job) => this.execute(job, at)))
    return due.map((job) => job.id)
  }

  private async execute(job: ScheduledJob, firedAt: Date): Promise<boolean> {
    let result: Result<unknown, BearingError>
    try {
      result = await job.run(firedAt)
    } catch (err) {
      console.error(`[scheduler] ${job.id} threw: ${messageOf(err)}`)
      return false
    }

    if (!result.ok) {
      console.error(`[scheduler] ${job.id} failed: ${result.error.message}`)
      return false
    }

    const recorded = this.runs.recordRun(job.id, firedAt)
    if (!recorded.ok) {
      console.warn(`[scheduler] Could not record run of ${job.id}: ${recorded.error.message}`)
    }
    console.log(`[scheduler] ${job.id} completed`)
    return true
  }
}
