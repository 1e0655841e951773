/**
 * @module history/history-store
 * HistoryStore interface and SQLiteHistoryStore implementation.
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import type { HistoricalRecord, HistoryConfig, HistoryQuery } from './types.js';
import { isExecutionStatus } from './types.js';
import { applyMigrations } from './migrations.js';
import { MemoryHistoryStore } from './memory-history-store.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { HarnessError, toErrorMessage } from '../errors.js';

/**
 * Append-only store of historical records.
 *
 * Records of one test id are kept in non-decreasing timestamp order:
 * `append` rejects a batch that would break the order, and rejects it as
 * a whole. Readers always receive copies.
 */
export interface HistoryStore {
  append(records: readonly HistoricalRecord[]): void;
  /** Records of `testId` in ascending timestamp order. */
  query(testId: string, options?: HistoryQuery): HistoricalRecord[];
  /** Every test id with at least one record, sorted. */
  testIds(): string[];
  close(): void;
}

/**
 * Check a batch against the latest stored timestamp per test id.
 * Records inside the batch must themselves be ordered per test id.
 *
 * @throws {HarnessError} NON_MONOTONIC_HISTORY
 */
export function assertAppendOrder(
  records: readonly HistoricalRecord[],
  latestStored: (testId: string) => number | undefined,
): void {
  const latest = new Map<string, number>();
  for (const record of records) {
    const previous = latest.get(record.testId) ?? latestStored(record.testId);
    if (previous !== undefined && record.timestamp < previous) {
      throw new HarnessError(
        'NON_MONOTONIC_HISTORY',
        `Record for "${record.testId}" at ${record.timestamp} is older than the stored history (${previous})`,
        { testId: record.testId, timestamp: record.timestamp, latest: previous, runId: record.runId },
      );
    }
    latest.set(record.testId, record.timestamp);
  }
}

// =====================================================================
// SQLiteHistoryStore
// =====================================================================

export class SQLiteHistoryStore implements HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('temp_store = MEMORY');
    this.db.pragma('cache_size = -8000');

    applyMigrations(this.db);
  }

  append(records: readonly HistoricalRecord[]): void {
    if (records.length === 0) return;

    const latestStmt = this.db.prepare<[string], { latest: number | null }>(
      'SELECT MAX(timestamp) AS latest FROM history_records WHERE test_id = ?',
    );

    const insert = this.db.prepare<[string, string, number, string, number, number]>(`
      INSERT INTO history_records (run_id, test_id, timestamp, status, duration, attempts_used)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction(() => {
      assertAppendOrder(records, (testId) => latestStmt.get(testId)?.latest ?? undefined);
      for (const r of records) {
        insert.run(r.runId, r.testId, r.timestamp, r.status, Math.round(r.duration), r.attemptsUsed);
      }
    });

    transaction();
  }

  query(testId: string, options?: HistoryQuery): HistoricalRecord[] {
    const conditions: string[] = ['test_id = ?'];
    const params: unknown[] = [testId];

    if (options?.from !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(options.from);
    }
    if (options?.to !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(options.to);
    }

    // Newest N first, then flipped back to ascending order.
    const limit = options?.limit !== undefined ? Math.max(0, Math.floor(options.limit)) : -1;
    params.push(limit);

    const rows = this.db.prepare<unknown[], RecordRow>(`
      SELECT * FROM (
        SELECT * FROM history_records WHERE ${conditions.join(' AND ')}
        ORDER BY timestamp DESC, seq DESC LIMIT ?
      ) ORDER BY timestamp ASC, seq ASC
    `).all(...params);

    return rows.map(mapRecordRow);
  }

  testIds(): string[] {
    const rows = this.db.prepare<[], { test_id: string }>(
      'SELECT DISTINCT test_id FROM history_records ORDER BY test_id ASC',
    ).all();
    return rows.map(r => r.test_id);
  }

  close(): void {
    this.db.close();
  }
}

// =====================================================================
// NoopHistoryStore — returned when history is disabled
// =====================================================================

export class NoopHistoryStore implements HistoryStore {
  append(): void { /* no-op */ }
  query(): HistoricalRecord[] { return []; }
  testIds(): string[] { return []; }
  close(): void { /* no-op */ }
}

// =====================================================================
// Factory
// =====================================================================

/** Default database location, relative to the project directory. */
export const DEFAULT_HISTORY_PATH = path.join('.flaketrack', 'history.db');

/**
 * Create a HistoryStore based on config.
 * - Returns NoopHistoryStore when `enabled: false`
 * - Returns MemoryHistoryStore for `storage: 'memory'`
 * - Returns SQLiteHistoryStore for `storage: 'local'`, with fallback to MemoryHistoryStore on failure
 */
export function createHistoryStore(
  config: Pick<HistoryConfig, 'enabled' | 'storage' | 'path'>,
  projectDir: string,
  logger: Logger = silentLogger,
): HistoryStore {
  if (!config.enabled) {
    return new NoopHistoryStore();
  }

  if (config.storage === 'memory') {
    return new MemoryHistoryStore();
  }

  const dbPath = path.resolve(projectDir, config.path ?? DEFAULT_HISTORY_PATH);

  try {
    return new SQLiteHistoryStore(dbPath);
  } catch (err) {
    logger.warn('failed to open SQLite history, falling back to memory store', {
      path: dbPath,
      error: toErrorMessage(err),
    });
    return new MemoryHistoryStore();
  }
}

// =====================================================================
// Row Mapping Helpers
// =====================================================================

interface RecordRow {
  seq: number;
  run_id: string;
  test_id: string;
  timestamp: number;
  status: string;
  duration: number;
  attempts_used: number;
  created_at: string;
}

function mapRecordRow(row: RecordRow): HistoricalRecord {
  if (!isExecutionStatus(row.status)) {
    throw new HarnessError('HISTORY_UNAVAILABLE', `Unknown status "${row.status}" in history row ${row.seq}`, {
      seq: row.seq,
      status: row.status,
    });
  }
  return {
    runId: row.run_id,
    testId: row.test_id,
    timestamp: row.timestamp,
    status: row.status,
    duration: row.duration,
    attemptsUsed: row.attempts_used,
  };
}
