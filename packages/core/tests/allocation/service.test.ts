import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { CampaignRepository } from '../../src/campaigns/repository.js'
import { MissionRepository } from '../../src/missions/repository.js'
import { SortieRepository } from '../../src/sorties/repository.js'
import { CheckInRepository } from '../../src/checkins/repository.js'
import { loadSnapshot } from '../../src/allocation/snapshot.js'
import {
  computeBriefing,
  computeDashboard,
  computeDriftReport,
  computeRoute,
  resolveDayCapacity,
} from '../../src/allocation/service.js'

let db: Database.Database
let campaignId: string
let missionId: string

const NOW = new Date('2026-03-02T12:00:00.000Z')

beforeEach(() => {
  db = openDatabase(':memory:')
  const campaign = new CampaignRepository(db).create({ name: 'Garden', priorityRank: 1, weeklyBlockTarget: 4 })
  if (!campaign.ok) throw new Error('Failed to create campaign')
  campaignId = campaign.value.id

  const mission = new MissionRepository(db).create({ campaignId, name: 'Beds' })
  if (!mission.ok) throw new Error('Failed to create mission')
  missionId = mission.value.id

  const sorties = new SortieRepository(db)
  for (const [title, cognitiveLoad] of [
    ['Design layout', 'deep'],
    ['Buy soil', 'light'],
  ] as const) {
    const s = sorties.create({ missionId, title, cognitiveLoad })
    if (!s.ok) throw new Error('Failed to create sortie')
  }
})

describe('loadSnapshot', () => {
  it('reads every table in one pass', () => {
    const result = loadSnapshot(db)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.campaigns).toHaveLength(1)
    expect(result.value.missions).toHaveLength(1)
    expect(result.value.sorties.map((s) => s.title)).toEqual(['Design layout', 'Buy soil'])
    expect(result.value.aars).toEqual([])
  })

  it('reports an unknown stored status as a data-integrity error', () => {
    db.prepare("UPDATE campaigns SET status = 'dormant' WHERE id = ?").run(campaignId)
    const result = loadSnapshot(db)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('DATA_INTEGRITY')
    expect(result.error.message).toContain("unexpected value 'dormant'")
  })

  it('reports an out-of-range estimate as a data-integrity error', () => {
    db.prepare('UPDATE sorties SET estimated_blocks = 0').run()
    const result = computeDashboard(db, NOW)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('DATA_INTEGRITY')
  })
})

describe('computeBriefing', () => {
  it('allocates from the stored queue', () => {
    const result = computeBriefing(db, { energyLevel: 'green', availableBlocks: 4 }, NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((i) => i.sortie.title)).toEqual(['Design layout', 'Buy soil'])
    expect(result.value[0].campaignName).toBe('Garden')
    expect(result.value[0].missionName).toBe('Beds')
  })

  it('applies the energy gate', () => {
    const result = computeBriefing(db, { energyLevel: 'red', availableBlocks: 4 }, NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.map((i) => i.sortie.title)).toEqual(['Buy soil'])
  })

  it('rejects an unknown energy level', () => {
    const result = computeBriefing(db, { energyLevel: 'purple', availableBlocks: 4 }, NOW)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects negative capacity', () => {
    const result = computeBriefing(db, { energyLevel: 'green', availableBlocks: -2 }, NOW)
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
    expect(result.error.message).toBe('Available blocks cannot be negative')
  })
})

describe('computeRoute', () => {
  it('returns the next best sortie', () => {
    const result = computeRoute(db, 'yellow', NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value?.sortie.title).toBe('Buy soil')
  })

  it('rejects an unknown energy level', () => {
    const result = computeRoute(db, 'blue', NOW)
    expect(result.ok).toBe(false)
  })
})

describe('computeDashboard', () => {
  it('includes the next sortie and mission counts', () => {
    const result = computeDashboard(db, NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.get(campaignId)).toMatchObject({
      name: 'Garden',
      missionsTotal: 1,
      missionsCompleted: 0,
      nextSortieTitle: 'Design layout',
    })
  })
})

describe('computeDriftReport', () => {
  it('reports insufficient data before any work is logged', () => {
    const result = computeDriftReport(db, NOW)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.insufficientData).toBe(true)
  })

  it('passes the validation error through for a bad window', () => {
    const result = computeDriftReport(db, NOW, { windowWeeks: -1 })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })
})

describe('resolveDayCapacity', () => {
  it('prefers the day’s check-in', () => {
    new CheckInRepository(db).upsert({ date: '2026-03-02', energyLevel: 'yellow', availableBlocks: 2 })
    const result = resolveDayCapacity(db, '2026-03-02', { energyLevel: 'green', availableBlocks: 4 })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toEqual({ energyLevel: 'yellow', availableBlocks: 2, fromCheckIn: true })
  })

  it('falls back to the defaults', () => {
    const result = resolveDayCapacity(db, '2026-03-02', { energyLevel: 'green', availableBlocks: 4 })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toEqual({ energyLevel: 'green', availableBlocks: 4, fromCheckIn: false })
  })
})
