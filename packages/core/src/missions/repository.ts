/**
 * Mission repository — CRUD for the middle layer between campaigns and sorties.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import {
  Ok,
  Err,
  BearingError,
  parseStoredEnum,
  toBearingError,
  joinIssues,
  stripUndefined,
} from '../common/index.js'
import type { Result } from '../common/index.js'
import { CreateMissionInputSchema, MissionStatusSchema, UpdateMissionInputSchema } from './schemas.js'
import type { Mission, MissionStatus, UpdateMissionInput } from './schemas.js'

export interface MissionRow {
  id: string
  campaign_id: string
  name: string
  description: string
  status: string
  target_date: string | null
  sort_order: number
  created_at: string
  completed_at: string | null
}

export function rowToMission(row: MissionRow): Mission {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    name: row.name,
    description: row.description,
    status: parseStoredEnum(MissionStatusSchema, row.status, `Mission ${row.id} status`),
    targetDate: row.target_date,
    sortOrder: row.sort_order,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  }
}

export class MissionRepository {
  constructor(private db: Database.Database) {}

  create(input: unknown): Result<Mission, BearingError> {
    const parsed = CreateMissionInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const data = parsed.data
    const now = new Date().toISOString()
    const id = uuidv4()

    try {
      const campaign = this.db.prepare('SELECT id FROM campaigns WHERE id = ?').get(data.campaignId)
      if (!campaign) return Err(BearingError.notFound('Campaign', data.campaignId))

      let sortOrder = data.sortOrder
      if (sortOrder === undefined) {
        const maxRow = this.db
          .prepare('SELECT MAX(sort_order) as max_order FROM missions WHERE campaign_id = ?')
          .get(data.campaignId) as { max_order: number | null } | undefined
        sortOrder = (maxRow?.max_order ?? -1) + 1
      }

      const completedAt = data.status === 'completed' ? now : null

      this.db
        .prepare(
          `INSERT INTO missions (id, campaign_id, name, description, status, target_date, sort_order, created_at, completed_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(id, data.campaignId, data.name, data.description, data.status, data.targetDate, sortOrder, now, completedAt)

      return Ok({
        id,
        campaignId: data.campaignId,
        name: data.name,
        description: data.description,
        status: data.status,
        targetDate: data.targetDate,
        sortOrder,
        createdAt: now,
        completedAt,
      })
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  getById(id: string): Result<Mission, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM missions WHERE id = ?').get(id) as MissionRow | undefined
      if (!row) return Err(BearingError.notFound('Mission', id))
      return Ok(rowToMission(row))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  listByCampaign(campaignId: string, opts?: { status?: MissionStatus }): Result<Mission[], BearingError> {
    try {
      let sql = 'SELECT * FROM missions WHERE campaign_id = ?'
      const params: unknown[] = [campaignId]

      if (opts?.status) {
        sql += ' AND status = ?'
        params.push(opts.status)
      }

      sql += ' ORDER BY sort_order ASC, created_at ASC'

      const rows = this.db.prepare(sql).all(...params) as MissionRow[]
      return Ok(rows.map(rowToMission))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /**
   * Partial update. Moving into `completed` stamps completedAt once;
   * moving out of it clears the stamp.
   */
  update(id: string, input: UpdateMissionInput, now?: string): Result<Mission, BearingError> {
    const parsed = UpdateMissionInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const existing = this.getById(id)
    if (!existing.ok) return existing

    const stamp = now ?? new Date().toISOString()
    const updated: Mission = { ...existing.value, ...stripUndefined(parsed.data) }

    if (updated.status === 'completed' && existing.value.status !== 'completed') {
      updated.completedAt = stamp
    } else if (updated.status !== 'completed') {
      updated.completedAt = null
    }

    try {
      this.db
        .prepare(
          `UPDATE missions SET name = ?, description = ?, status = ?, target_date = ?, sort_order = ?, completed_at = ?
           WHERE id = ?`,
        )
        .run(
          updated.name,
          updated.description,
          updated.status,
          updated.targetDate,
          updated.sortOrder,
          updated.completedAt,
          id,
        )
      return Ok(updated)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  complete(id: string, now?: string): Result<Mission, BearingError> {
    return this.update(id, { status: 'completed' }, now)
  }
}
