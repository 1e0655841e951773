/**
 * @module retry-engine
 * RetryHandler — wraps a single test invocation with bounded retry,
 * backoff, selective-failure matching and attempt recording.
 *
 * Permanent failures short-circuit immediately; transient failures are
 * retried until the policy's attempts are exhausted. The wait between
 * attempts suspends only the awaiting execution context.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import type {
  AttemptSummary,
  ExecutionResult,
  FailureDetail,
  RetryPolicy,
  RetryPolicyInput,
  RetryPolicySet,
  RetryPredicate,
  ScenarioOutcome,
  TestUnit,
} from './types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

// =====================================================================
// Delay parsing
// =====================================================================

const DELAY_MULTIPLIERS = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
} as const;

type DelayUnit = keyof typeof DELAY_MULTIPLIERS;

function isDelayUnit(value: string): value is DelayUnit {
  return value in DELAY_MULTIPLIERS;
}

/**
 * Parse a human-readable delay string ("2s", "500ms") into milliseconds.
 * A bare number is taken as milliseconds.
 */
export function parseDelay(delay: string): number {
  const trimmed = delay.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(-?\d+(?:\.\d+)?)\s*(ms|s|m|h)$/);
  const unit = match?.[2];
  if (!match || !unit || !isDelayUnit(unit)) {
    throw new Error(`Invalid delay format: "${delay}". Expected "2s", "500ms", etc.`);
  }

  return Math.round(Number(match[1]) * DELAY_MULTIPLIERS[unit]);
}

/**
 * Convert a configured duration to milliseconds. Numbers and unit-less
 * numeric strings are seconds; strings with a unit go through
 * {@link parseDelay}.
 */
export function toMilliseconds(value: number | string): number {
  if (typeof value === 'number') return Math.round(value * 1000);
  const trimmed = value.trim();
  return /^\d+(?:\.\d+)?$/.test(trimmed) ? Math.round(Number(trimmed) * 1000) : parseDelay(value);
}

// =====================================================================
// Failure classification
// =====================================================================

const TRANSIENT_KINDS = new Set([
  'ConnectionError',
  'TimeoutError',
  'NetworkError',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'TransientError',
]);

const TRANSIENT_INDICATORS = [
  'connection refused',
  'connection timeout',
  'network unreachable',
  'temporary failure',
  'service temporarily unavailable',
  'internal server error',
  'gateway timeout',
  'bad gateway',
  'cannot connect to',
  'browser launch failed',
  'page crash',
  'browser disconnected',
  'websocket connection failed',
  'socket hang up',
  'econnrefused',
  'econnreset',
  'etimedout',
];

const ASSERTION_INDICATORS = [
  'expected status',
  'assert failed',
  'assertionerror',
  'expected',
  'but was',
  'but got',
];

/**
 * Decide whether a failure looks transient (network, timing, browser
 * infrastructure). Assertion failures are never transient.
 */
export function isTransientFailure(failure: FailureDetail): boolean {
  if (failure.kind === 'AssertionError') return false;
  if (failure.kind && TRANSIENT_KINDS.has(failure.kind)) return true;
  if (failure.status === 'timeout') return true;

  const message = failure.message.toLowerCase();
  if (ASSERTION_INDICATORS.some((indicator) => message.includes(indicator))) {
    return false;
  }
  return TRANSIENT_INDICATORS.some((indicator) => message.includes(indicator));
}

export const retryAll: RetryPredicate = () => true;

export const retryNone: RetryPredicate = () => false;

/**
 * Build a predicate from regular-expression sources matched against the
 * failure kind and message (case-insensitive).
 */
export function matchFailures(patterns: readonly string[]): RetryPredicate {
  const regexes = patterns.map((p) => new RegExp(p, 'i'));
  return (failure) =>
    regexes.some((re) => re.test(failure.message) || (failure.kind !== undefined && re.test(failure.kind)));
}

// =====================================================================
// Policies
// =====================================================================

/** Upper bound on a single backoff delay unless configured otherwise. */
export const DEFAULT_MAX_DELAY_MS = 30_000;

const DEFAULT_POLICY_FIELDS = {
  maxAttempts: 3,
  delayMs: 1000,
  exponentialBackoff: true,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
} as const;

/**
 * Build an immutable RetryPolicy from loosely-typed input.
 *
 * Out-of-range numbers are clamped rather than rejected, and every clamp
 * is reported through the logger as a warning.
 */
export function normalizeRetryPolicy(input: RetryPolicyInput = {}, logger: Logger = silentLogger): RetryPolicy {
  let maxAttempts = input.maxAttempts ?? DEFAULT_POLICY_FIELDS.maxAttempts;
  if (!Number.isFinite(maxAttempts) || maxAttempts < 1) {
    logger.warn('maxAttempts must be at least 1; clamping to 1', { configured: maxAttempts });
    maxAttempts = 1;
  } else if (!Number.isInteger(maxAttempts)) {
    const floored = Math.floor(maxAttempts);
    logger.warn('maxAttempts must be an integer; rounding down', { configured: maxAttempts, used: floored });
    maxAttempts = floored;
  }

  let delayMs = input.delayMs ?? DEFAULT_POLICY_FIELDS.delayMs;
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    logger.warn('delay must be non-negative; clamping to 0', { configured: delayMs });
    delayMs = 0;
  }

  let maxDelayMs = input.maxDelayMs ?? DEFAULT_POLICY_FIELDS.maxDelayMs;
  if (Number.isNaN(maxDelayMs) || maxDelayMs < 0) {
    logger.warn('maxDelay must be non-negative; clamping to 0', { configured: maxDelayMs });
    maxDelayMs = 0;
  }

  return Object.freeze({
    maxAttempts,
    delayMs,
    exponentialBackoff: input.exponentialBackoff ?? DEFAULT_POLICY_FIELDS.exponentialBackoff,
    maxDelayMs,
    isRetryable: input.isRetryable ?? retryAll,
  });
}

/** Retries any failure: 3 attempts, 1s exponential. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = normalizeRetryPolicy();

/** Network-level failures only: 3 attempts, 2s exponential. */
export const NETWORK_RETRY_POLICY: RetryPolicy = normalizeRetryPolicy({
  maxAttempts: 3,
  delayMs: 2000,
  exponentialBackoff: true,
  isRetryable: isTransientFailure,
});

/** API scenarios: transient failures, 3 attempts, 1.5s exponential. */
export const API_RETRY_POLICY: RetryPolicy = normalizeRetryPolicy({
  maxAttempts: 3,
  delayMs: 1500,
  exponentialBackoff: true,
  isRetryable: isTransientFailure,
});

/** UI scenarios: any failure, 2 attempts, fixed 1s delay. */
export const UI_RETRY_POLICY: RetryPolicy = normalizeRetryPolicy({
  maxAttempts: 2,
  delayMs: 1000,
  exponentialBackoff: false,
  isRetryable: retryAll,
});

/** Never retries. */
export const NO_RETRY_POLICY: RetryPolicy = normalizeRetryPolicy({
  maxAttempts: 1,
  delayMs: 0,
  isRetryable: retryNone,
});

/**
 * Resolve the effective retry policy for a unit.
 * Priority: test id > first matching tag > kind > default.
 */
export function resolveRetryPolicy(unit: TestUnit, policies: RetryPolicySet): RetryPolicy {
  const byTest = policies.tests?.[unit.id];
  if (byTest) return byTest;

  if (policies.tags) {
    for (const tag of unit.tags) {
      const byTag = policies.tags[tag];
      if (byTag) return byTag;
    }
  }

  return policies.kinds?.[unit.kind] ?? policies.default;
}

/**
 * Compute the wait before the attempt following `failedAttempt`.
 *
 * Linear: `delayMs`. Exponential: `delayMs * 2^(failedAttempt - 1)`.
 * Both are capped at `maxDelayMs`.
 */
export function computeBackoffDelay(
  policy: Pick<RetryPolicy, 'delayMs' | 'exponentialBackoff' | 'maxDelayMs'>,
  failedAttempt: number,
): number {
  const raw = policy.exponentialBackoff
    ? policy.delayMs * Math.pow(2, Math.max(0, failedAttempt - 1))
    : policy.delayMs;
  return Math.min(raw, policy.maxDelayMs);
}

// =====================================================================
// RetryHandler
// =====================================================================

/** Identifies what a retried invocation belongs to. */
export interface RetryTarget {
  testId: string;
  groupId: string;
}

export interface RetryEvent {
  testId: string;
  groupId: string;
  /** The attempt about to start */
  nextAttempt: number;
  delayMs: number;
  failure: FailureDetail;
}

export interface RetryExecuteOptions {
  /** Aborts pending waits and prevents further attempts */
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
  /** Called right before attempt `attempt` invokes the scenario */
  onAttemptStart?: (attempt: number, timestamp: number) => void;
  /** Called with each attempt's summary once its outcome is known */
  onAttempt?: (summary: AttemptSummary) => void;
}

export interface RetryHandlerOptions {
  logger?: Logger;
  /** Suspend the caller for `ms`; rejects when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return sleepFor(ms, undefined, { signal });
}

/**
 * RetryHandler wraps a zero-argument scenario invocation with retry logic
 * and produces the unit's final ExecutionResult.
 *
 * The invocation reports failures through its outcome. If it throws, the
 * error propagates: a throw means the execution context failed, which is
 * not something a retry can fix.
 */
export class RetryHandler {
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(options?: RetryHandlerOptions) {
    this.logger = options?.logger ?? silentLogger;
    this.sleep = options?.sleep ?? defaultSleep;
    this.now = options?.now ?? Date.now;
  }

  async execute(
    invoke: () => Promise<ScenarioOutcome>,
    policy: RetryPolicy,
    target: RetryTarget,
    options?: RetryExecuteOptions,
  ): Promise<ExecutionResult> {
    const attempts: AttemptSummary[] = [];
    const signal = options?.signal;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();

      const timestamp = this.now();
      options?.onAttemptStart?.(attempt, timestamp);
      const outcome = await invoke();

      if (outcome.status === 'passed') {
        const summary: AttemptSummary = { attempt, status: 'passed', duration: outcome.duration, timestamp };
        attempts.push(summary);
        options?.onAttempt?.(summary);
        if (attempt > 1) {
          this.logger.info('passed after retry', { test: target.testId, attempt });
        }
        return this.finish(target, 'passed', attempts);
      }

      const failure: FailureDetail = {
        status: outcome.status,
        message: outcome.failure?.message ?? `Scenario ${outcome.status}`,
        kind: outcome.failure?.kind,
      };
      const retryable = policy.isRetryable(failure);
      const summary: AttemptSummary = {
        attempt,
        status: outcome.status,
        duration: outcome.duration,
        timestamp,
        error: failure.message,
        retryable,
      };
      attempts.push(summary);
      options?.onAttempt?.(summary);

      if (!retryable) {
        this.logger.debug('permanent failure, not retrying', { test: target.testId, attempt });
        return this.finish(target, outcome.status, attempts);
      }
      if (attempt >= policy.maxAttempts) {
        this.logger.warn('retry attempts exhausted', { test: target.testId, attempts: attempt });
        return this.finish(target, outcome.status, attempts);
      }

      const delayMs = computeBackoffDelay(policy, attempt);
      this.logger.info('attempt failed, retrying', {
        test: target.testId,
        attempt,
        of: policy.maxAttempts,
        delayMs,
        error: failure.message,
      });
      options?.onRetry?.({ ...target, nextAttempt: attempt + 1, delayMs, failure });
      await this.sleep(delayMs, signal);
    }
  }

  private finish(target: RetryTarget, status: ExecutionResult['status'], attempts: AttemptSummary[]): ExecutionResult {
    const error = attempts[attempts.length - 1]?.error;
    return {
      testId: target.testId,
      groupId: target.groupId,
      status,
      duration: attempts.reduce((sum, a) => sum + a.duration, 0),
      attemptsUsed: attempts.length,
      attempts,
      error,
      timestamp: this.now(),
    };
  }
}

/**
 * Higher-order form of {@link RetryHandler.execute}: run `invoke` under
 * `policy` and return the final ExecutionResult.
 */
export function withRetry(
  invoke: () => Promise<ScenarioOutcome>,
  policy: RetryPolicy,
  target: RetryTarget,
  options?: RetryExecuteOptions & RetryHandlerOptions,
): Promise<ExecutionResult> {
  return new RetryHandler(options).execute(invoke, policy, target, options);
}

// =====================================================================
// Retry statistics
// =====================================================================

export interface RetryStatistics {
  executions: number;
  successes: number;
  failures: number;
  totalAttempts: number;
  /** Mean attempts among passing executions; 0 when none passed */
  averageAttemptsToSuccess: number;
}

/**
 * Aggregate retry behaviour per test id from a set of results.
 * Cancelled results carry no retry signal and are skipped.
 */
export function summarizeRetries(results: readonly ExecutionResult[]): Map<string, RetryStatistics> {
  const stats = new Map<string, RetryStatistics>();
  const attemptsToSuccess = new Map<string, number>();

  for (const result of results) {
    if (result.status === 'cancelled') continue;

    const entry = stats.get(result.testId) ?? {
      executions: 0,
      successes: 0,
      failures: 0,
      totalAttempts: 0,
      averageAttemptsToSuccess: 0,
    };
    entry.executions++;
    entry.totalAttempts += result.attemptsUsed;
    if (result.status === 'passed') {
      const total = (attemptsToSuccess.get(result.testId) ?? 0) + result.attemptsUsed;
      attemptsToSuccess.set(result.testId, total);
      entry.successes++;
      entry.averageAttemptsToSuccess = total / entry.successes;
    } else {
      entry.failures++;
    }
    stats.set(result.testId, entry);
  }

  return stats;
}
