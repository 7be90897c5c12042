import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Mock } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { Ok, Err, BearingError } from '../../src/common/index.js'
import { CampaignRepository } from '../../src/campaigns/repository.js'
import { MissionRepository } from '../../src/missions/repository.js'
import { SortieRepository } from '../../src/sorties/repository.js'
import { CheckInRepository } from '../../src/checkins/repository.js'
import type { Notifier } from '../../src/notify/webhook.js'
import {
  runMorningBriefing,
  runWeeklyReview,
  createDefaultJobs,
  createScheduler,
  MORNING_BRIEFING_JOB,
  WEEKLY_REVIEW_JOB,
} from '../../src/schedule/jobs.js'
import type { JobDeps } from '../../src/schedule/jobs.js'

let db: Database.Database
let notify: Mock<Notifier>
let deps: JobDeps

const FIRED_AT = new Date('2026-03-02T07:00:00.000Z')

beforeEach(() => {
  db = openDatabase(':memory:')
  notify = vi.fn<Notifier>(async () => Ok('sent' as const))
  deps = { db, settings: { timeZone: 'UTC', defaultEnergy: 'green', defaultBlocks: 4 }, notify }
  vi.spyOn(console, 'log').mockImplementation(() => {})

  const campaign = new CampaignRepository(db).create({ name: 'Writing', priorityRank: 1, weeklyBlockTarget: 3 })
  if (!campaign.ok) throw new Error('Failed to create campaign')
  const mission = new MissionRepository(db).create({ campaignId: campaign.value.id, name: 'Draft' })
  if (!mission.ok) throw new Error('Failed to create mission')
  const sorties = new SortieRepository(db)
  sorties.create({ missionId: mission.value.id, title: 'Plot the ending', cognitiveLoad: 'deep' })
  sorties.create({ missionId: mission.value.id, title: 'Outline chapter', cognitiveLoad: 'light' })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('runMorningBriefing', () => {
  it('uses today’s check-in and sends the briefing', async () => {
    new CheckInRepository(db).upsert({ date: '2026-03-02', energyLevel: 'red', availableBlocks: 2 })

    const result = await runMorningBriefing(deps, FIRED_AT)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toBe('Morning Briefing — 2026-03-02\n\n1. Outline chapter (Writing)')
    expect(notify).toHaveBeenCalledWith({ title: 'Morning Briefing', body: result.value })
  })

  it('falls back to the default energy and blocks', async () => {
    const result = await runMorningBriefing(deps, FIRED_AT)
    if (!result.ok) throw new Error('briefing failed')
    expect(result.value).toBe(
      'Morning Briefing — 2026-03-02\n\n1. Plot the ending (Writing)\n2. Outline chapter (Writing)',
    )
  })

  it('dates the briefing in the configured zone', async () => {
    const result = await runMorningBriefing(
      { ...deps, settings: { ...deps.settings, timeZone: 'Pacific/Auckland' } },
      new Date('2026-03-01T18:00:00.000Z'),
    )
    if (!result.ok) throw new Error('briefing failed')
    expect(result.value.split('\n')[0]).toBe('Morning Briefing — 2026-03-02')
  })

  it('fails when delivery fails', async () => {
    notify.mockResolvedValueOnce(Err(BearingError.notify('ntfy webhook returned HTTP 502')))
    const result = await runMorningBriefing(deps, FIRED_AT)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('NOTIFY_ERROR')
  })
})

describe('runWeeklyReview', () => {
  it('sends the review as markdown', async () => {
    const result = await runWeeklyReview(deps, new Date('2026-03-01T18:00:00.000Z'))
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.split('\n')[0]).toBe('# Weekly Review — 2026-02-22 to 2026-03-01')
    expect(notify).toHaveBeenCalledWith({ title: 'Weekly Review', body: result.value })
  })
})

describe('createDefaultJobs', () => {
  it('builds both jobs from the configured crons', () => {
    const jobs = createDefaultJobs(deps, { briefingCron: '30 6 * * *', reviewCron: '0 17 * * 5' })
    expect(jobs.map((j) => [j.id, j.cron, j.catchUp])).toEqual([
      [MORNING_BRIEFING_JOB, '30 6 * * *', true],
      [WEEKLY_REVIEW_JOB, '0 17 * * 5', true],
    ])
  })
})

describe('createScheduler', () => {
  it('wires a scheduler that is not yet running', () => {
    const scheduler = createScheduler(
      db,
      {
        dbPath: ':memory:',
        timeZone: 'UTC',
        webhookUrl: '',
        webhookType: 'ntfy',
        briefingCron: '0 7 * * *',
        reviewCron: '0 18 * * 0',
        defaultEnergy: 'green',
        defaultBlocks: 4,
      },
      notify,
    )
    expect(scheduler.isRunning).toBe(false)
  })
})
