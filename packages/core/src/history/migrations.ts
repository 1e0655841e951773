/**
 * @module history/migrations
 * SQLite schema migrations using user_version pragma for version tracking.
 */

import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  description: string;
  up: string[];
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create append-only history_records table with per-test index',
    up: [
      `CREATE TABLE IF NOT EXISTS history_records (
        seq           INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id        TEXT NOT NULL,
        test_id       TEXT NOT NULL,
        timestamp     INTEGER NOT NULL,
        status        TEXT NOT NULL CHECK (status IN ('passed', 'failed', 'error', 'timeout', 'cancelled')),
        duration      INTEGER NOT NULL DEFAULT 0,
        attempts_used INTEGER NOT NULL DEFAULT 0 CHECK (attempts_used >= 0),
        created_at    TEXT NOT NULL DEFAULT (datetime('now'))
      )`,
      'CREATE INDEX IF NOT EXISTS idx_records_test_ts ON history_records(test_id, timestamp, seq)',
      'CREATE INDEX IF NOT EXISTS idx_records_run_id ON history_records(run_id)',
      `CREATE TRIGGER IF NOT EXISTS history_records_no_update
        BEFORE UPDATE ON history_records
        BEGIN
          SELECT RAISE(ABORT, 'history_records is append-only');
        END`,
      `CREATE TRIGGER IF NOT EXISTS history_records_no_delete
        BEFORE DELETE ON history_records
        BEGIN
          SELECT RAISE(ABORT, 'history_records is append-only');
        END`,
    ],
  },
];

/** Latest schema version known to this build. */
export const SCHEMA_VERSION = MIGRATIONS.reduce((max, m) => Math.max(max, m.version), 0);

/**
 * Apply pending migrations to the database.
 * Uses the SQLite `user_version` pragma to track the current schema version.
 */
export function applyMigrations(db: Database.Database): void {
  const raw: unknown = db.pragma('user_version', { simple: true });
  const currentVersion = typeof raw === 'number' ? raw : 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      const migrate = db.transaction(() => {
        for (const sql of migration.up) {
          db.exec(sql);
        }
        db.pragma(`user_version = ${migration.version}`);
      });
      migrate();
    }
  }
}
