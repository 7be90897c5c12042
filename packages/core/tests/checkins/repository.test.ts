import { describe, it, expect, beforeEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { CheckInRepository } from '../../src/checkins/repository.js'

let db: Database.Database
let repo: CheckInRepository

beforeEach(() => {
  db = openDatabase(':memory:')
  repo = new CheckInRepository(db)
})

describe('CheckInRepository', () => {
  it('records a check-in', () => {
    const result = repo.upsert({ date: '2026-03-02', energyLevel: 'green', availableBlocks: 4 })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.energyLevel).toBe('green')
    expect(result.value.availableBlocks).toBe(4)
    expect(result.value.focusNote).toBe('')
  })

  it('overwrites the same date and keeps its id', () => {
    const first = repo.upsert({ date: '2026-03-02', energyLevel: 'green', availableBlocks: 4 })
    const second = repo.upsert({
      date: '2026-03-02',
      energyLevel: 'red',
      availableBlocks: 1,
      focusNote: 'Poor sleep',
    })
    if (!first.ok || !second.ok) throw new Error('upsert failed')
    expect(second.value.id).toBe(first.value.id)
    expect(second.value.energyLevel).toBe('red')
    expect(second.value.focusNote).toBe('Poor sleep')

    const count = db.prepare('SELECT COUNT(*) as n FROM daily_checkins').get() as { n: number }
    expect(count.n).toBe(1)
  })

  it('rejects an unknown energy level', () => {
    const result = repo.upsert({ date: '2026-03-02', energyLevel: 'orange', availableBlocks: 4 })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })

  it('rejects a malformed date', () => {
    const result = repo.upsert({ date: '02/03/2026', energyLevel: 'green', availableBlocks: 4 })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Date must be YYYY-MM-DD')
  })

  it('rejects a date that is not on the calendar', () => {
    const result = repo.upsert({ date: '2026-02-30', energyLevel: 'green', availableBlocks: 4 })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Date must be a real calendar date')
  })

  it('returns null for a day without a check-in', () => {
    const result = repo.getByDate('2026-03-02')
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toBeNull()
  })

  it('lists an inclusive date range oldest first', () => {
    for (const date of ['2026-03-03', '2026-02-27', '2026-03-01', '2026-02-20']) {
      repo.upsert({ date, energyLevel: 'yellow', availableBlocks: 3 })
    }
    const result = repo.listRange('2026-02-27', '2026-03-03')
    if (!result.ok) throw new Error('list failed')
    expect(result.value.map((c) => c.date)).toEqual(['2026-02-27', '2026-03-01', '2026-03-03'])
  })
})
