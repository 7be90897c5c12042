/**
 * Sortie repository — queue management and the start/complete lifecycle.
 *
 * queued → active → completed | abandoned. Completion writes the AAR and the
 * status change in one transaction; aars.sortie_id is UNIQUE, so a second
 * complete for the same sortie fails instead of double-writing.
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
  stripUndefined,
} from '../common/index.js'
import type { Result } from '../common/index.js'
import {
  CloseStatusSchema,
  CognitiveLoadSchema,
  CompleteSortieInputSchema,
  CreateSortieInputSchema,
  SortieStatusSchema,
  UpdateSortieInputSchema,
} from './schemas.js'
import type { AAR, CloseStatus, Sortie, SortieStatus, UpdateSortieInput } from './schemas.js'

// ── Row mapping ──

export interface SortieRow {
  id: string
  mission_id: string
  title: string
  description: string
  cognitive_load: string
  estimated_blocks: number
  status: string
  sort_order: number
  created_at: string
  started_at: string | null
  completed_at: string | null
}

export function rowToSortie(row: SortieRow): Sortie {
  const ctx = `Sortie ${row.id}`
  return {
    id: row.id,
    missionId: row.mission_id,
    title: row.title,
    description: row.description,
    status: parseStoredEnum(SortieStatusSchema, row.status, `${ctx} status`),
    cognitiveLoad: parseStoredEnum(CognitiveLoadSchema, row.cognitive_load, `${ctx} cognitive_load`),
    estimatedBlocks: parseStoredInt(row.estimated_blocks, 1, `${ctx} estimated_blocks`),
    sortOrder: row.sort_order,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  }
}

const OPEN_STATUSES: ReadonlySet<SortieStatus> = new Set(['queued', 'active'])

export interface CompletedSortie {
  sortie: Sortie
  aar: AAR
}

// ── Repository ──

export class SortieRepository {
  constructor(private db: Database.Database) {}

  create(input: unknown): Result<Sortie, BearingError> {
    const parsed = CreateSortieInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const data = parsed.data
    const now = new Date().toISOString()
    const id = uuidv4()

    try {
      const mission = this.db.prepare('SELECT id FROM missions WHERE id = ?').get(data.missionId)
      if (!mission) return Err(BearingError.notFound('Mission', data.missionId))

      const sortOrder = data.sortOrder ?? this.nextSortOrder(data.missionId)

      this.db
        .prepare(
          `INSERT INTO sorties (id, mission_id, title, description, cognitive_load, estimated_blocks, status, sort_order, created_at)
           VALUES (?, ?, ?, ?, ?, ?, 'queued', ?, ?)`,
        )
        .run(id, data.missionId, data.title, data.description, data.cognitiveLoad, data.estimatedBlocks, sortOrder, now)

      return Ok({
        id,
        missionId: data.missionId,
        title: data.title,
        description: data.description,
        status: 'queued',
        cognitiveLoad: data.cognitiveLoad,
        estimatedBlocks: data.estimatedBlocks,
        sortOrder,
        createdAt: now,
        startedAt: null,
        completedAt: null,
      })
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  getById(id: string): Result<Sortie, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM sorties WHERE id = ?').get(id) as SortieRow | undefined
      if (!row) return Err(BearingError.notFound('Sortie', id))
      return Ok(rowToSortie(row))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  listByMission(missionId: string): Result<Sortie[], BearingError> {
    try {
      const rows = this.db
        .prepare('SELECT * FROM sorties WHERE mission_id = ? ORDER BY sort_order ASC, created_at ASC')
        .all(missionId) as SortieRow[]
      return Ok(rows.map(rowToSortie))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Queued sorties across all campaigns, by campaign rank, mission order, then queue order. */
  listQueued(): Result<Sortie[], BearingError> {
    try {
      const rows = this.db
        .prepare(
          `SELECT s.* FROM sorties s
           JOIN missions m ON m.id = s.mission_id
           JOIN campaigns c ON c.id = m.campaign_id
           WHERE s.status = 'queued'
           ORDER BY c.priority_rank ASC, m.sort_order ASC, s.sort_order ASC, s.created_at ASC`,
        )
        .all() as SortieRow[]
      return Ok(rows.map(rowToSortie))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  update(id: string, input: UpdateSortieInput): Result<Sortie, BearingError> {
    const parsed = UpdateSortieInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const existing = this.getById(id)
    if (!existing.ok) return existing

    const updated: Sortie = { ...existing.value, ...stripUndefined(parsed.data) }

    try {
      this.db
        .prepare(
          'UPDATE sorties SET title = ?, description = ?, cognitive_load = ?, estimated_blocks = ?, sort_order = ? WHERE id = ?',
        )
        .run(updated.title, updated.description, updated.cognitiveLoad, updated.estimatedBlocks, updated.sortOrder, id)
      return Ok(updated)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** queued → active. */
  start(id: string, now?: string): Result<Sortie, BearingError> {
    const stamp = now ?? new Date().toISOString()
    try {
      const txn = this.db.transaction((): Sortie => {
        const sortie = this.requireSortie(id)
        if (sortie.status !== 'queued') {
          throw BearingError.transition(`Cannot start sortie with status '${sortie.status}'`)
        }
        this.db.prepare("UPDATE sorties SET status = 'active', started_at = ? WHERE id = ?").run(stamp, id)
        return { ...sortie, status: 'active', startedAt: stamp }
      })
      return Ok(txn())
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /**
   * Close an open sortie with its AAR. Outcome `completed` marks the sortie
   * completed; any other outcome marks it abandoned.
   */
  complete(id: string, input: unknown, now?: string): Result<CompletedSortie, BearingError> {
    const parsed = CompleteSortieInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const data = parsed.data
    const stamp = now ?? new Date().toISOString()

    try {
      const txn = this.db.transaction((): CompletedSortie => {
        const sortie = this.requireSortie(id)
        if (!OPEN_STATUSES.has(sortie.status)) {
          throw BearingError.transition(`Cannot complete sortie with status '${sortie.status}'`)
        }
        const existingAar = this.db.prepare('SELECT id FROM aars WHERE sortie_id = ?').get(id)
        if (existingAar) {
          throw BearingError.transition(`Sortie ${id} already has an after-action report`)
        }

        const aar: AAR = {
          id: uuidv4(),
          sortieId: id,
          outcome: data.outcome,
          energyBefore: data.energyBefore,
          energyAfter: data.energyAfter,
          actualBlocks: data.actualBlocks,
          notes: data.notes,
          createdAt: stamp,
        }

        this.db
          .prepare(
            `INSERT INTO aars (id, sortie_id, outcome, energy_before, energy_after, actual_blocks, notes, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
          )
          .run(aar.id, id, aar.outcome, aar.energyBefore, aar.energyAfter, aar.actualBlocks, aar.notes, stamp)

        const status: SortieStatus = data.outcome === 'completed' ? 'completed' : 'abandoned'
        this.db
          .prepare('UPDATE sorties SET status = ?, completed_at = ? WHERE id = ?')
          .run(status, stamp, id)

        return { sortie: { ...sortie, status, completedAt: stamp }, aar }
      })
      return Ok(txn())
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Drop an open sortie from the queue without a report. */
  abandon(id: string): Result<Sortie, BearingError> {
    try {
      const txn = this.db.transaction((): Sortie => {
        const sortie = this.requireSortie(id)
        if (!OPEN_STATUSES.has(sortie.status)) {
          throw BearingError.transition(`Cannot abandon sortie with status '${sortie.status}'`)
        }
        this.db.prepare("UPDATE sorties SET status = 'abandoned' WHERE id = ?").run(id)
        return { ...sortie, status: 'abandoned' }
      })
      return Ok(txn())
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Re-parent a sortie; it goes to the back of the target mission's queue. */
  move(id: string, missionId: string): Result<Sortie, BearingError> {
    try {
      const txn = this.db.transaction((): Sortie => {
        const sortie = this.requireSortie(id)
        const mission = this.db.prepare('SELECT id FROM missions WHERE id = ?').get(missionId)
        if (!mission) throw BearingError.notFound('Mission', missionId)
        const sortOrder = this.nextSortOrder(missionId)
        this.db.prepare('UPDATE sorties SET mission_id = ?, sort_order = ? WHERE id = ?').run(missionId, sortOrder, id)
        return { ...sortie, missionId, sortOrder }
      })
      return Ok(txn())
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Rewrite queue order within one mission: position in `orderedIds` becomes sort_order. */
  reorder(missionId: string, orderedIds: string[]): Result<void, BearingError> {
    try {
      const stmt = this.db.prepare('UPDATE sorties SET sort_order = ? WHERE id = ? AND mission_id = ?')
      const txn = this.db.transaction(() => {
        orderedIds.forEach((id, i) => {
          const info = stmt.run(i, id, missionId)
          if (info.changes === 0) throw BearingError.notFound('Sortie', id)
        })
      })
      txn()
      return Ok(undefined)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /**
   * Close several open sorties at once without reports. Ids that are unknown
   * or already closed are skipped. Returns the number changed.
   */
  bulkClose(ids: string[], status: CloseStatus, now?: string): Result<number, BearingError> {
    const parsed = CloseStatusSchema.safeParse(status)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const stamp = now ?? new Date().toISOString()
    try {
      const stmt = this.db.prepare(
        "UPDATE sorties SET status = ?, completed_at = ? WHERE id = ? AND status IN ('queued', 'active')",
      )
      const txn = this.db.transaction(() => {
        let changed = 0
        for (const id of ids) {
          changed += stmt.run(parsed.data, parsed.data === 'completed' ? stamp : null, id).changes
        }
        return changed
      })
      return Ok(txn())
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  // ── Internals ──

  private requireSortie(id: string): Sortie {
    const row = this.db.prepare('SELECT * FROM sorties WHERE id = ?').get(id) as SortieRow | undefined
    if (!row) throw BearingError.notFound('Sortie', id)
    return rowToSortie(row)
  }

  private nextSortOrder(missionId: string): number {
    const maxRow = this.db
      .prepare('SELECT MAX(sort_order) as max_order FROM sorties WHERE mission_id = ?')
      .get(missionId) as { max_order: number | null } | undefined
    return (maxRow?.max_order ?? -1) + 1
  }
}
