/**
 * Last fire time per scheduled job, kept so a restart can catch up on a
 * missed run.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, toBearingError } from '../common/index.js'
import type { Result, BearingError } from '../common/index.js'

interface JobRunRow {
  job_id: string
  last_run_at: string
}

export class JobRunRepository {
  constructor(private db: Database.Database) {}

  getLastRun(jobId: string): Result<string | null, BearingError> {
    try {
      const row = this.db.prepare('SELECT * FROM job_runs WHERE job_id = ?').get(jobId) as
        | JobRunRow
        | undefined
      return Ok(row ? row.last_run_at : null)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }

  recordRun(jobId: string, at: Date): Result<void, BearingError> {
    try {
      this.db
        .prepare(
          `INSERT INTO job_runs (job_id, last_run_at) VALUES (?, ?)
           ON CONFLICT(job_id) DO UPDATE SET last_run_at = excluded.last_run_at`,
        )
        .run(jobId, at.toISOString())
      return Ok(undefined)
    } catch (e) {
      return Err(toBearingError(e))
    }
  }
}
