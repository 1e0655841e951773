/**
 * @module types
 * Shared type definitions for flaketrack-core.
 *
 * Covers test units and groups, scenario execution, retry policies and
 * per-unit execution results. History types live in `history/types.ts`.
 */

// ==================== Test Units ====================

/** Broad category of a test unit, used for grouping and policy lookup. */
export type TestKind = 'api' | 'ui' | 'other';

/** Smallest independently executable test scenario. */
export interface TestUnit {
  readonly id: string;
  /** Tags without a leading `@` */
  readonly tags: ReadonlySet<string>;
  readonly kind: TestKind;
}

/** A named, ordered collection of test units selected for batched execution. */
export interface TestGroup {
  readonly id: string;
  /** Execution strategy tag, e.g. "api", "ui", "smoke" */
  readonly strategy: string;
  readonly units: readonly TestUnit[];
}

// ==================== Execution ====================

/** Final status of a test unit within a run. */
export type ExecutionStatus = 'passed' | 'failed' | 'error' | 'timeout' | 'cancelled';

/** Statuses a scenario executor may report for a single attempt. */
export type AttemptStatus = Exclude<ExecutionStatus, 'cancelled'>;

/** Failure information reported by the scenario executor. */
export interface FailureDetail {
  status: AttemptStatus;
  message: string;
  /** Failure class, e.g. "ConnectionError" or "AssertionError" */
  kind?: string;
}

/** Outcome of one invocation of a scenario. */
export interface ScenarioOutcome {
  status: AttemptStatus;
  /** Duration in milliseconds */
  duration: number;
  failure?: { message: string; kind?: string };
}

/**
 * Runs scenarios inside one execution context.
 *
 * `execute` reports test failures through the returned outcome. A thrown
 * error means the context itself failed and is treated as a crash.
 *
 * `signal` aborts when the group times out or the run is cancelled, with a
 * HarnessError (`GROUP_TIMEOUT` or `RUN_CANCELLED`) as its reason. `execute`
 * must stop its work and settle as soon as that happens: the runner hands
 * the pool slot to the next queued group once the context is terminated, so
 * an execution that ignores the signal overlaps with the next group.
 */
export interface ScenarioExecutor {
  execute(unit: TestUnit, signal: AbortSignal): Promise<ScenarioOutcome>;
  /** Release context resources (browser, API session). */
  dispose?(): Promise<void>;
}

/** Creates a fresh executor for each group's execution context. */
export type ExecutorFactory = (group: TestGroup) => ScenarioExecutor | Promise<ScenarioExecutor>;

/** Plain callback form of a scenario executor. */
export type ScenarioCallback = (unit: TestUnit, signal: AbortSignal) => Promise<ScenarioOutcome>;

// ==================== Retry ====================

/** Classifies a failure as retryable (transient) or permanent. */
export type RetryPredicate = (failure: FailureDetail) => boolean;

/** Immutable retry configuration for a test unit. */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly exponentialBackoff: boolean;
  /** Ceiling applied to every computed delay */
  readonly maxDelayMs: number;
  readonly isRetryable: RetryPredicate;
}

/** Retry fields as supplied by callers or configuration, before clamping. */
export interface RetryPolicyInput {
  maxAttempts?: number;
  delayMs?: number;
  exponentialBackoff?: boolean;
  maxDelayMs?: number;
  isRetryable?: RetryPredicate;
}

/** Policy lookup table; the most specific entry wins. */
export interface RetryPolicySet {
  default: RetryPolicy;
  kinds?: Partial<Record<TestKind, RetryPolicy>>;
  tags?: Record<string, RetryPolicy>;
  tests?: Record<string, RetryPolicy>;
}

/** Record of a single attempt of a test unit. */
export interface AttemptSummary {
  attempt: number;
  status: ExecutionStatus;
  duration: number;
  timestamp: number;
  error?: string;
  retryable?: boolean;
}

/** Final result of one test unit in one group of a run. */
export interface ExecutionResult {
  testId: string;
  groupId: string;
  status: ExecutionStatus;
  /** Sum of attempt durations in milliseconds; retry waits are excluded */
  duration: number;
  /** 0 when the unit never started (crashed, timed-out or cancelled group) */
  attemptsUsed: number;
  attempts: AttemptSummary[];
  /** Message of the final failure or of the interruption */
  error?: string;
  /** Completion time (epoch milliseconds) */
  timestamp: number;
}
