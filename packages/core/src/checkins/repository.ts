/**
 * Check-in repository — one record per calendar date.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import {
  Ok,
  Err,
  BearingError,
  parseStoredEnum,
  parseStoredInt,
  toBearingError,
  joinIssues,
} from '../common/index.js'
import type { Result } from '../common/index.js'
import { EnergyLevelSchema, UpsertCheckInInputSchema } from './schemas.js'
import type { DailyCheckIn } from './schemas.js'

interface CheckInRow {
  id: string
  date: string
  energy_level: string
  available_blocks: number
  focus_note: string
  created_at: string
  updated_at: string
}

function rowToCheckIn(row: CheckInRow): DailyCheckIn {
  return {
    id: row.id,
    date: row.date,
    energyLevel: parseStoredEnum(EnergyLevelSchema, row.energy_level, `Check-in ${row.date} energy level`),
    availableBlocks: parseStoredInt(row.available_blocks, 0, `Check-in ${row.date} available_blocks`),
    focusNote: row.focus_note,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export class CheckInRepository {
  constructor(private db: Database.Database) {}

  /** Insert, or overwrite the existing check-in for the same date. The id survives an overwrite. */
  upsert(input: unknown): Result<DailyCheckIn, BearingError> {
    const parsed = UpsertCheckInInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const data = parsed.data
    const now = new Date().toISOString()

    try {
      this.db
        .prepare(
          `INSERT INTO daily_checkins (id, date, energy_level, available_blocks, focus_note, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(date) DO UPDATE SET
             energy_level = excluded.energy_level,
             available_blocks = excluded.available_blocks,
             focus_note = excluded.focus_note,
             updated_at = excluded.updated_at`,
        )
        .run(uuidv4(), data.date, data.energyLevel, data.availableBlocks, data.focusNote, now, now)

      const row = this.db.prepare('SELECT * FROM daily_checkins WHERE date = ?').get(data.date) as
        | CheckInRow
        | undefined
      if (!row) return Err(BearingError.db(`Check-in for ${data.date} missing after upsert`))
      return Ok(rowToCheckIn(row))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  getByDate(date: string): Result<DailyCheckIn | null, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM daily_checkins WHERE date = ?').get(date) as
        | CheckInRow
        | undefined
      return Ok(row ? rowToCheckIn(row) : null)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Check-ins with from <= date <= to, oldest first. */
  listRange(from: string, to: string): Result<DailyCheckIn[], BearingError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM daily_checkins WHERE date >= ? AND date <= ? ORDER BY date ASC')
        .all(from, to) as CheckInRow[]
      return Ok(rows.map(rowToCheckIn))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }
}
