/**
 * @module history/flakiness-analyzer
 * Scores test units by how often their pass/fail outcome flips between
 * consecutive runs, and exposes their status trends.
 *
 * Only the last `window` non-cancelled records are considered. With K of
 * them, the instability ratio is `transitions / (K − 1)`.
 */

import type { HistoryStore } from './history-store.js';
import type {
  FlakinessScore,
  HistoricalRecord,
  StabilityClass,
  TrendDataPoint,
  TrendPoint,
} from './types.js';
import { toOutcome } from './types.js';

export const DEFAULT_FLAKY_WINDOW = 10;
export const DEFAULT_FLAKY_THRESHOLD = 0.2;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FlakinessAnalyzerOptions {
  /** Number of recent non-cancelled records analyzed (K upper bound) */
  window?: number;
  /** Ratio strictly above which a unit is classified flaky */
  threshold?: number;
  now?: () => number;
}

export interface AnalyzeAllOptions {
  minRatio?: number;
  topN?: number;
  classification?: StabilityClass;
}

/**
 * Score a record series (ascending by timestamp). Pure: the same records
 * always give the same score. Returns `null` when no record carries a
 * pass/fail outcome.
 */
export function scoreHistory(
  testId: string,
  records: readonly HistoricalRecord[],
  window: number = DEFAULT_FLAKY_WINDOW,
  threshold: number = DEFAULT_FLAKY_THRESHOLD,
): FlakinessScore | null {
  const size = Math.max(1, Math.floor(window));
  const sample = records.filter(r => toOutcome(r.status) !== null).slice(-size);
  const last = sample.at(-1);
  if (!last) return null;

  const outcomes = sample.map(r => toOutcome(r.status));
  let transitions = 0;
  for (let i = 1; i < outcomes.length; i++) {
    if (outcomes[i] !== outcomes[i - 1]) transitions++;
  }

  const passCount = outcomes.filter(o => o === 'pass').length;
  const failCount = sample.length - passCount;
  const lastPassed = toOutcome(last.status) === 'pass';
  const instabilityRatio = sample.length >= 2 ? transitions / (sample.length - 1) : null;
  const retried = sample.filter(r => r.attemptsUsed > 1).length;

  let classification: StabilityClass;
  if (instabilityRatio === null || instabilityRatio === 0) {
    classification = lastPassed ? 'stable-pass' : 'stable-fail';
  } else if (instabilityRatio > threshold) {
    classification = 'flaky';
  } else if (passCount === failCount) {
    classification = lastPassed ? 'stable-pass' : 'stable-fail';
  } else {
    classification = passCount > failCount ? 'stable-pass' : 'stable-fail';
  }

  const score: Omit<FlakinessScore, 'suggestion'> = {
    testId,
    instabilityRatio,
    classification,
    sampleSize: sample.length,
    transitions,
    passCount,
    failCount,
    lastStatus: last.status,
    retryRate: retried / sample.length,
  };
  return { ...score, suggestion: generateSuggestion(score) };
}

export class FlakinessAnalyzer {
  private readonly window: number;
  private readonly threshold: number;
  private readonly now: () => number;

  constructor(
    private store: HistoryStore,
    options?: FlakinessAnalyzerOptions,
  ) {
    this.window = Math.max(1, Math.floor(options?.window ?? DEFAULT_FLAKY_WINDOW));
    this.threshold = options?.threshold ?? DEFAULT_FLAKY_THRESHOLD;
    this.now = options?.now ?? Date.now;
  }

  /** Score one test unit; `null` when it has no analyzable history. */
  analyze(testId: string): FlakinessScore | null {
    return scoreHistory(testId, this.store.query(testId), this.window, this.threshold);
  }

  /**
   * Score every known test unit, most unstable first.
   * Units without a ratio sort as 0.
   */
  analyzeAll(options?: AnalyzeAllOptions): FlakinessScore[] {
    const minRatio = options?.minRatio ?? 0;
    const topN = options?.topN ?? 50;

    const results: FlakinessScore[] = [];
    for (const testId of this.store.testIds()) {
      const score = this.analyze(testId);
      if (!score) continue;
      if ((score.instabilityRatio ?? 0) < minRatio) continue;
      if (options?.classification && score.classification !== options.classification) continue;
      results.push(score);
    }

    results.sort((a, b) => (b.instabilityRatio ?? 0) - (a.instabilityRatio ?? 0));
    return results.slice(0, topN);
  }

  /**
   * The unit's most recent `window` statuses, oldest first.
   * Every iteration re-reads the store, so the iterable reflects records
   * appended after it was created.
   */
  trend(testId: string, window: number = this.window): Iterable<TrendPoint> {
    const store = this.store;
    const limit = Math.max(0, Math.floor(window));
    return {
      *[Symbol.iterator]() {
        for (const record of store.query(testId, { limit })) {
          yield { timestamp: record.timestamp, status: record.status };
        }
      },
    };
  }

  /** Pass rate per UTC day over the last `days` days (1–90, default 14). */
  dailyPassRate(testId: string, days = 14): TrendDataPoint[] {
    const span = Math.min(Math.max(Math.floor(days), 1), 90);
    const now = this.now();
    const records = this.store.query(testId, { from: now - span * DAY_MS, to: now });

    const dayMap = new Map<string, { passed: number; total: number }>();
    for (const record of records) {
      const outcome = toOutcome(record.status);
      if (outcome === null) continue;
      const date = new Date(record.timestamp).toISOString().slice(0, 10);
      const bucket = dayMap.get(date) ?? { passed: 0, total: 0 };
      bucket.total++;
      if (outcome === 'pass') bucket.passed++;
      dayMap.set(date, bucket);
    }

    return [...dayMap.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, bucket]) => ({
        date,
        value: Math.round((bucket.passed / bucket.total) * 100 * 100) / 100,
        runCount: bucket.total,
      }));
  }
}

function generateSuggestion(score: Omit<FlakinessScore, 'suggestion'>): string {
  const { sampleSize, passCount, failCount, transitions } = score;
  if (sampleSize < 2) {
    return 'Insufficient history for analysis.';
  }

  switch (score.classification) {
    case 'stable-pass':
      return failCount === 0
        ? `Test is stable: all ${sampleSize} recent runs passed.`
        : `Test is mostly stable with occasional failures (${failCount}/${sampleSize} runs). Monitor for recurring patterns.`;
    case 'stable-fail':
      return passCount === 0
        ? `Test has failed in all ${sampleSize} recent runs. This is likely a real bug, not flakiness.`
        : `Test fails consistently (${failCount}/${sampleSize} runs). Fix the underlying issue before tuning retries.`;
    case 'flaky': {
      const pct = Math.round((score.instabilityRatio ?? 0) * 100);
      const retries = score.retryRate > 0
        ? ` ${Math.round(score.retryRate * 100)}% of runs needed retries.`
        : '';
      return `Outcome changed ${transitions} times in ${sampleSize} runs (${pct}% instability).${retries} Investigate timing-dependent assertions and external dependencies.`;
    }
  }
}
