/**
 * Campaign repository — CRUD, status filtering and priority re-ranking.
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
  CampaignStatusSchema,
  CreateCampaignInputSchema,
  UpdateCampaignInputSchema,
  RerankInputSchema,
} from './schemas.js'
import type { Campaign, CampaignStatus, UpdateCampaignInput } from './schemas.js'

// ── Row mapping ──

export interface CampaignRow {
  id: string
  name: string
  description: string
  status: string
  priority_rank: number
  weekly_block_target: number
  colour: string
  tags: string
  target_date: string | null
  created_at: string
  updated_at: string
}

export function rowToCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    status: parseStoredEnum(CampaignStatusSchema, row.status, `Campaign ${row.id} status`),
    priorityRank: parseStoredInt(row.priority_rank, 1, `Campaign ${row.id} priority_rank`),
    weeklyBlockTarget: parseStoredInt(row.weekly_block_target, 0, `Campaign ${row.id} weekly_block_target`),
    colour: row.colour,
    tags: row.tags,
    targetDate: row.target_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

// ── Repository ──

export class CampaignRepository {
  constructor(private db: Database.Database) {}

  create(input: unknown): Result<Campaign, BearingError> {
    const parsed = CreateCampaignInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const data = parsed.data
    const now = new Date().toISOString()
    const id = uuidv4()

    try {
      this.db
        .prepare(
          `INSERT INTO campaigns (id, name, description, status, priority_rank, weekly_block_target, colour, tags, target_date, created_at, updated_at)
           VALUES (?, ?, ?, 'active', ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          data.name,
          data.description,
          data.priorityRank,
          data.weeklyBlockTarget,
          data.colour,
          data.tags,
          data.targetDate,
          now,
          now,
        )

      return Ok({
        id,
        name: data.name,
        description: data.description,
        status: 'active',
        priorityRank: data.priorityRank,
        weeklyBlockTarget: data.weeklyBlockTarget,
        colour: data.colour,
        tags: data.tags,
        targetDate: data.targetDate,
        createdAt: now,
        updatedAt: now,
      })
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  getById(id: string): Result<Campaign, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM campaigns WHERE id = ?').get(id) as CampaignRow | undefined
      if (!row) return Err(BearingError.notFound('Campaign', id))
      return Ok(rowToCampaign(row))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** All campaigns, or those in one status, by priority rank then creation time. */
  list(opts?: { status?: CampaignStatus }): Result<Campaign[], BearingError> {
    try {
      let sql = 'SELECT * FROM campaigns'
      const params: unknown[] = []

      if (opts?.status) {
        sql += ' WHERE status = ?'
        params.push(opts.status)
      }

      sql += ' ORDER BY priority_rank ASC, created_at ASC, id ASC'

      const rows = this.db.prepare(sql).all(...params) as CampaignRow[]
      return Ok(rows.map(rowToCampaign))
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  getActive(): Result<Campaign[], BearingError> {
    return this.list({ status: 'active' })
  }

  update(id: string, input: UpdateCampaignInput): Result<Campaign, BearingError> {
    const parsed = UpdateCampaignInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const existing = this.getById(id)
    if (!existing.ok) return existing

    const now = new Date().toISOString()
    const updated: Campaign = {
      ...existing.value,
      ...stripUndefined(parsed.data),
      updatedAt: now,
    }

    try {
      this.db
        .prepare(
          `UPDATE campaigns SET name = ?, description = ?, status = ?, priority_rank = ?, weekly_block_target = ?,
           colour = ?, tags = ?, target_date = ?, updated_at = ? WHERE id = ?`,
        )
        .run(
          updated.name,
          updated.description,
          updated.status,
          updated.priorityRank,
          updated.weeklyBlockTarget,
          updated.colour,
          updated.tags,
          updated.targetDate,
          now,
          id,
        )
      return Ok(updated)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  /** Soft delete: archived campaigns drop out of allocation and drift. */
  archive(id: string): Result<Campaign, BearingError> {
    return this.update(id, { status: 'archived' })
  }

  /** Apply a new priority ordering atomically. Unknown ids abort the whole batch. */
  rerank(input: unknown): Result<Campaign[], BearingError> {
    const parsed = RerankInputSchema.safeParse(input)
    if (!parsed.success) {
      return Err(BearingError.validation(joinIssues(parsed.error)))
    }

    const now = new Date().toISOString()
    try {
      const stmt = this.db.prepare('UPDATE campaigns SET priority_rank = ?, updated_at = ? WHERE id = ?')
      const txn = this.db.transaction((ranks: Array<{ id: string; rank: number }>) => {
        for (const r of ranks) {
          const info = stmt.run(r.rank, now, r.id)
          if (info.changes === 0) throw BearingError.notFound('Campaign', r.id)
        }
      })
      txn(parsed.data)
    } catch (e) {
      return Err(toBearingError(e))
    }

    return this.list()
  }
}
