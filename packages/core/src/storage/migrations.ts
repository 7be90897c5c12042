/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

/**
 * Runs SQL statements using the better-sqlite3 Database.exec() method.
 * Note: This is NOT child_process.exec — it's SQLite's native exec for DDL.
 */
function runSQL(db: Database.Database, sql: string): void {
  db.exec(sql)
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema — campaigns, missions, sorties',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS campaigns (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          description TEXT NOT NULL DEFAULT '',
          status TEXT NOT NULL DEFAULT 'active',
          priority_rank INTEGER NOT NULL,
          weekly_block_target INTEGER NOT NULL DEFAULT 0,
          colour TEXT NOT NULL DEFAULT '#6366f1',
          tags TEXT NOT NULL DEFAULT '',
          target_date TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS missions (
          id TEXT PRIMARY KEY,
          campaign_id TEXT NOT NULL,
          name TEXT NOT NULL,
          description TEXT NOT NULL DEFAULT '',
          status TEXT NOT NULL DEFAULT 'not_started',
          target_date TEXT,
          sort_order INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          completed_at TEXT,
          FOREIGN KEY (campaign_id) REFERENCES campaigns(id) ON DELETE CASCADE
        );

        CREATE TABLE IF NOT EXISTS sorties (
          id TEXT PRIMARY KEY,
          mission_id TEXT NOT NULL,
          title TEXT NOT NULL,
          description TEXT NOT NULL DEFAULT '',
          cognitive_load TEXT NOT NULL,
          estimated_blocks INTEGER NOT NULL DEFAULT 1,
          status TEXT NOT NULL DEFAULT 'queued',
          sort_order INTEGER NOT NULL DEFAULT 0,
          created_at TEXT NOT NULL,
          started_at TEXT,
          completed_at TEXT,
          FOREIGN KEY (mission_id) REFERENCES missions(id) ON DELETE CASCADE
        );

        CREATE INDEX IF NOT EXISTS idx_campaigns_status ON campaigns(status);
        CREATE INDEX IF NOT EXISTS idx_missions_campaign ON missions(campaign_id);
        CREATE INDEX IF NOT EXISTS idx_sorties_mission ON sorties(mission_id);
        CREATE INDEX IF NOT EXISTS idx_sorties_status ON sorties(status);

        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT NOT NULL
        );
      `,
      )
    },
  },
  {
    version: 2,
    description: 'After-action reports and daily check-ins',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS aars (
          id TEXT PRIMARY KEY,
          sortie_id TEXT NOT NULL UNIQUE,
          outcome TEXT NOT NULL,
          energy_before TEXT NOT NULL,
          energy_after TEXT NOT NULL,
          actual_blocks INTEGER NOT NULL DEFAULT 0,
          notes TEXT NOT NULL DEFAULT '',
          created_at TEXT NOT NULL,
          FOREIGN KEY (sortie_id) REFERENCES sorties(id) ON DELETE CASCADE
        );

        CREATE INDEX IF NOT EXISTS idx_aars_created ON aars(created_at);

        CREATE TABLE IF NOT EXISTS daily_checkins (
          id TEXT PRIMARY KEY,
          date TEXT NOT NULL UNIQUE,
          energy_level TEXT NOT NULL,
          available_blocks INTEGER NOT NULL,
          focus_note TEXT NOT NULL DEFAULT '',
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `,
      )
    },
  },
  {
    version: 3,
    description: 'Scheduler job runs — last fire time per job',
    up(db) {
      runSQL(
        db,
        `
        CREATE TABLE IF NOT EXISTS job_runs (
          job_id TEXT PRIMARY KEY,
          last_run_at TEXT NOT NULL
        );
      `,
      )
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1]?.version ?? 0

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  runSQL(
    db,
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const currentVersion = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined

  const applied = currentVersion?.version ?? 0

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}
