/**
 * The two scheduled jobs: morning briefing and weekly review.
 */

import type Database from 'better-sqlite3'
import { Ok, mapResult } from '../common/index.js'
import type { Result, BearingError } from '../common/index.js'
import { computeBriefing, resolveDayCapacity } from '../allocation/service.js'
import { formatBriefingText } from '../allocation/render.js'
import { computeWeeklyReview } from '../review/weekly-review.js'
import { formatWeeklyReviewMarkdown } from '../review/render.js'
import type { Settings } from '../config/settings.js'
import { createWebhookNotifier } from '../notify/webhook.js'
import type { Notifier } from '../notify/webhook.js'
import { zonedDate } from './cron.js'
import { Scheduler } from './scheduler.js'
import type { ScheduledJob } from './scheduler.js'

export const MORNING_BRIEFING_JOB = 'morning-briefing'
export const WEEKLY_REVIEW_JOB = 'weekly-review'

export interface JobDeps {
  db: Database.Database
  settings: Pick<Settings, 'timeZone' | 'defaultEnergy' | 'defaultBlocks'>
  notify: Notifier
}

/** Today's check-in (or the configured defaults) through the allocator, then out as text. */
export async function runMorningBriefing(deps: JobDeps, firedAt: Date): Promise<Result<string, BearingError>> {
  const date = zonedDate(firedAt, deps.settings.timeZone)
  const capacity = resolveDayCapacity(deps.db, date, {
    energyLevel: deps.settings.defaultEnergy,
    availableBlocks: deps.settings.defaultBlocks,
  })
  if (!capacity.ok) return capacity

  const { energyLevel, availableBlocks, fromCheckIn } = capacity.value
  const items = computeBriefing(deps.db, { energyLevel, availableBlocks }, firedAt)
  if (!items.ok) return items

  console.log(
    `[scheduler] Morning briefing for ${date}: ${items.value.length} sorties, ` +
      `${energyLevel}/${availableBlocks} blocks from ${fromCheckIn ? 'check-in' : 'defaults'}`,
  )

  const text = formatBriefingText(items.value, date)
  const sent = await deps.notify({ title: 'Morning Briefing', body: text })
  if (!sent.ok) return sent
  return Ok(text)
}

export async function runWeeklyReview(deps: JobDeps, firedAt: Date): Promise<Result<string, BearingError>> {
  const markdown = mapResult(computeWeeklyReview(deps.db, firedAt), formatWeeklyReviewMarkdown)
  if (!markdown.ok) return markdown

  const sent = await deps.notify({ title: 'Weekly Review', body: markdown.value })
  if (!sent.ok) return sent
  return markdown
}

export function createDefaultJobs(
  deps: JobDeps,
  crons: Pick<Settings, 'briefingCron' | 'reviewCron'>,
): ScheduledJob[] {
  return [
    {
      id: MORNING_BRIEFING_JOB,
      cron: crons.briefingCron,
      catchUp: true,
      run: (firedAt) => runMorningBriefing(deps, firedAt),
    },
    {
      id: WEEKLY_REVIEW_JOB,
      cron: crons.reviewCron,
      catchUp: true,
      run: (firedAt) => runWeeklyReview(deps, firedAt),
    },
  ]
}

/** Scheduler wired to the settings' crons, zone and webhook. */
export function createScheduler(db: Database.Database, settings: Settings, notify?: Notifier): Scheduler {
  const deps: JobDeps = {
    db,
    settings,
    notify: notify ?? createWebhookNotifier({ url: settings.webhookUrl, type: settings.webhookType }),
  }
  return new Scheduler({
    db,
    timeZone: settings.timeZone,
    jobs: createDefaultJobs(deps, settings),
  })
}
