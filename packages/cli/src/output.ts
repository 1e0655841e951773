/**
 * @module output
 * Plain-text formatting of run results, flakiness scores and trends, plus
 * the small output sink the commands write through.
 */

import type { ExecutionResult, ExecutionStatus, FlakinessScore, TrendPoint } from 'flaketrack-core';

// ── ANSI colours ──────────────────────────────────────────────────────
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

/** Where a command writes. Tests pass a collecting implementation. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Apply ANSI colours */
  color: boolean;
}

export const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  color: process.stdout.isTTY === true,
};

const STATUS_COLOURS: Record<ExecutionStatus, string> = {
  passed: GREEN,
  failed: RED,
  error: RED,
  timeout: YELLOW,
  cancelled: GRAY,
};

const STATUS_ORDER: readonly ExecutionStatus[] = ['passed', 'failed', 'error', 'timeout', 'cancelled'];

export function paint(io: CliIO, text: string, colour: string): string {
  return io.color ? `${colour}${text}${RESET}` : text;
}

export function bold(io: CliIO, text: string): string {
  return paint(io, text, BOLD);
}

export function statusColour(status: ExecutionStatus): string {
  return STATUS_COLOURS[status];
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/** `PASSED    checkout [kind:api] 120ms (2 attempts)` */
export function formatResultLine(result: ExecutionResult): string {
  let line = `${result.status.toUpperCase().padEnd(9)} ${result.testId} [${result.groupId}] ${formatDuration(result.duration)}`;
  if (result.attemptsUsed > 1) {
    line += ` (${result.attemptsUsed} attempts)`;
  }
  if (result.status !== 'passed' && result.error) {
    const firstLine = result.error.split('\n')[0] ?? '';
    line += `\n          ${firstLine}`;
  }
  return line;
}

/** `Summary: 2 passed, 1 failed (3 results)`; zero counts other than passed are left out. */
export function formatSummary(results: readonly ExecutionResult[]): string {
  const counts = new Map<ExecutionStatus, number>();
  for (const result of results) {
    counts.set(result.status, (counts.get(result.status) ?? 0) + 1);
  }
  const parts = STATUS_ORDER
    .filter((status) => status === 'passed' || (counts.get(status) ?? 0) > 0)
    .map((status) => `${counts.get(status) ?? 0} ${status}`);
  return `Summary: ${parts.join(', ')} (${results.length} results)`;
}

/** `flaky       checkout ratio=0.75 runs=5 retried=20%` */
export function formatScore(score: FlakinessScore): string {
  const ratio = score.instabilityRatio === null ? 'n/a' : score.instabilityRatio.toFixed(2);
  return `${score.classification.padEnd(11)} ${score.testId} ratio=${ratio} runs=${score.sampleSize} retried=${Math.round(score.retryRate * 100)}%`;
}

/** `2026-01-02T03:04:05.000Z passed` */
export function formatTrendPoint(point: TrendPoint): string {
  return `${new Date(point.timestamp).toISOString()} ${point.status}`;
}
