/**
 * AAR repository — read side of after-action reports.
 * Reports are written only by SortieRepository.complete().
 */

import type Database from 'better-sqlite3'
import { Ok, Err, BearingError, parseStoredEnum, parseStoredInt, toBearingError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { EnergyLevelSchema } from '../checkins/schemas.js'
import { AAROutcomeSchema } from './schemas.js'
import type { AAR } from './schemas.js'

export interface AARRow {
  id: string
  sortie_id: string
  outcome: string
  energy_before: string
  energy_after: string
  actual_blocks: number
  notes: string
  created_at: string
}

export function rowToAAR(row: AARRow): AAR {
  const ctx = `AAR ${row.id}`
  return {
    id: row.id,
    sortieId: row.sortie_id,
    outcome: parseStoredEnum(AAROutcomeSchema, row.outcome, `${ctx} outcome`),
    energyBefore: parseStoredEnum(EnergyLevelSchema, row.energy_before, `${ctx} energy_before`),
    energyAfter: parseStoredEnum(EnergyLevelSchema, row.energy_after, `${ctx} energy_after`),
    actualBlocks: parseStoredInt(row.actual_blocks, 0, `${ctx} actual_blocks`),
    notes: row.notes,
    createdAt: row.created_at,
  }
}

export class AARRepository {
  constructor(private db: Database.Database) {}

  getBySortie(sortieId: string): Result<AAR | null, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM aars WHERE sortie_id = ?').get(sortieId) as AARRow | undefined
      return Ok(row ? rowToAAR(row) : null)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Reports created at or after `since` (ISO timestamp), oldest first. */
  listSince(since: string): Result<AAR[], BearingError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM aars WHERE created_at >= ? ORDER BY created_at ASC, id ASC')
        .all(since) as AARRow[]
      return Ok(rows.map(rowToAAR))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  listAll(): Result<AAR[], BearingError> {
    try {
      const rows = this.db.prepare('SELECT * FROM aars ORDER BY created_at ASC, id ASC').all() as AARRow[]
      return Ok(rows.map(rowToAAR))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }
}
