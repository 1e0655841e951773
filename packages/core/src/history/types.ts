/**
 * @module history/types
 * Type definitions for the execution history & flakiness analysis subsystem.
 */

import type { ExecutionStatus } from '../types.js';

/** Persistent record of one test unit's final status in one run. Append-only. */
export interface HistoricalRecord {
  runId: string;
  testId: string;
  /** Epoch milliseconds */
  timestamp: number;
  status: ExecutionStatus;
  duration: number;
  attemptsUsed: number;
}

/** Stability classification of a test unit. */
export type StabilityClass = 'stable-pass' | 'stable-fail' | 'flaky';

/** Pass/fail view of a status; `null` for statuses that carry no signal. */
export type Outcome = 'pass' | 'fail';

/** Computed flakiness analysis for one test unit. Never persisted. */
export interface FlakinessScore {
  testId: string;
  /** transitions / (K − 1); `null` when only one record is available */
  instabilityRatio: number | null;
  classification: StabilityClass;
  /** K: number of non-cancelled records analyzed */
  sampleSize: number;
  transitions: number;
  passCount: number;
  failCount: number;
  lastStatus: ExecutionStatus;
  /** Share of analyzed runs that needed more than one attempt */
  retryRate: number;
  suggestion: string;
}

/** One entry of a test unit's status series. */
export interface TrendPoint {
  timestamp: number;
  status: ExecutionStatus;
}

/** Daily pass-rate bucket. */
export interface TrendDataPoint {
  /** UTC day, `YYYY-MM-DD` */
  date: string;
  /** Pass rate in percent, 0–100 */
  value: number;
  runCount: number;
}

/** Options for reading a test unit's records. */
export interface HistoryQuery {
  /** Inclusive lower bound (epoch milliseconds) */
  from?: number;
  /** Inclusive upper bound (epoch milliseconds) */
  to?: number;
  /** Keep only the newest N matching records */
  limit?: number;
}

/** `history` section of flaketrack.yaml. */
export interface HistoryConfig {
  enabled: boolean;
  storage: 'local' | 'memory';
  path?: string;
  /** Number of recent records the analyzer looks at */
  window: number;
  /** Instability ratio above which a unit is flaky */
  threshold: number;
}

export const DEFAULT_HISTORY_CONFIG: HistoryConfig = {
  enabled: true,
  storage: 'local',
  window: 10,
  threshold: 0.2,
};

const STATUSES: ReadonlySet<string> = new Set(['passed', 'failed', 'error', 'timeout', 'cancelled']);

export function isExecutionStatus(value: string): value is ExecutionStatus {
  return STATUSES.has(value);
}

/** `passed` counts as a pass; `failed`, `error` and `timeout` as a fail. */
export function toOutcome(status: ExecutionStatus): Outcome | null {
  switch (status) {
    case 'passed':
      return 'pass';
    case 'failed':
    case 'error':
    case 'timeout':
      return 'fail';
    case 'cancelled':
      return null;
  }
}
