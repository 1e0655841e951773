/**
 * @module history/history-recorder
 * Post-run recording — turns a run's results into historical records and
 * appends them in a single batch.
 */

import type { HistoryStore } from './history-store.js';
import type { HistoricalRecord } from './types.js';
import type { ExecutionResult, ExecutionStatus } from '../types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { toErrorMessage } from '../errors.js';

export interface HistoryRecorderOptions {
  logger?: Logger;
  now?: () => number;
}

export interface RecordRunResult {
  runId: string;
  records: HistoricalRecord[];
}

/**
 * Rank used when one unit ran in several groups. Cancelled only wins when
 * every occurrence was cancelled.
 */
const STATUS_SEVERITY: Record<ExecutionStatus, number> = {
  cancelled: 0,
  passed: 1,
  failed: 2,
  timeout: 3,
  error: 4,
};

/**
 * Collapse results to one record per test id, in first-seen order.
 * Multiple occurrences keep the least favourable status, the summed
 * duration, the maximum attempts and the latest timestamp.
 */
export function toRecords(runId: string, results: readonly ExecutionResult[]): HistoricalRecord[] {
  const byTest = new Map<string, HistoricalRecord>();

  for (const result of results) {
    const existing = byTest.get(result.testId);
    if (!existing) {
      byTest.set(result.testId, {
        runId,
        testId: result.testId,
        timestamp: result.timestamp,
        status: result.status,
        duration: result.duration,
        attemptsUsed: result.attemptsUsed,
      });
      continue;
    }

    if (STATUS_SEVERITY[result.status] > STATUS_SEVERITY[existing.status]) {
      existing.status = result.status;
    }
    existing.duration += result.duration;
    existing.attemptsUsed = Math.max(existing.attemptsUsed, result.attemptsUsed);
    existing.timestamp = Math.max(existing.timestamp, result.timestamp);
  }

  return [...byTest.values()];
}

export class HistoryRecorder {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private store: HistoryStore,
    options?: HistoryRecorderOptions,
  ) {
    this.logger = options?.logger ?? silentLogger;
    this.now = options?.now ?? Date.now;
  }

  /**
   * Append one record per test id of the run. Returns `null` when the
   * store rejects the batch; recording never fails the run.
   */
  record(results: readonly ExecutionResult[]): RecordRunResult | null {
    const runId = `run-${this.now()}-${randomSuffix()}`;
    const records = toRecords(runId, results);

    try {
      this.store.append(records);
      this.logger.debug('history recorded', { runId, records: records.length });
      return { runId, records };
    } catch (err) {
      this.logger.error('failed to record history', { runId, error: toErrorMessage(err) });
      return null;
    }
  }
}

function randomSuffix(): string {
  return Math.random().toString(36).slice(2, 8);
}
