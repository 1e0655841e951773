/**
 * @module parallel-engine
 * ParallelTestRunner — runs test groups concurrently under a bounded pool
 * of isolated execution contexts.
 *
 * Uses a counting semaphore for the pool (groups beyond the pool size wait
 * in FIFO declaration order) and one {@link GroupContext} per group. A
 * context's crash, timeout or cancellation only affects the units of its
 * own group; every unit still ends up with exactly one ExecutionResult.
 */

import { EventEmitter } from 'node:events';
import os from 'node:os';
import type {
  ExecutionResult,
  ExecutorFactory,
  RetryPolicy,
  RetryPolicySet,
  ScenarioCallback,
  TestGroup,
} from './types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { RetryEvent } from './retry-engine.js';
import { DEFAULT_RETRY_POLICY, RetryHandler } from './retry-engine.js';
import type { ContextMessage, Interruption } from './group-context.js';
import { GroupContext } from './group-context.js';
import type { HarnessErrorCode } from './errors.js';
import { HarnessError, toErrorMessage } from './errors.js';

// =====================================================================
// Types
// =====================================================================

/** Default group wall-clock budget: one hour. */
export const DEFAULT_GROUP_TIMEOUT_MS = 3_600_000;

/** Largest delay a Node.js timer accepts. */
const MAX_TIMER_MS = 2_147_483_647;

export type GroupState = 'completed' | 'crashed' | 'timeout' | 'cancelled';

export interface GroupSummary {
  groupId: string;
  state: GroupState;
  /** Wall-clock time the group held a context, in milliseconds */
  duration: number;
  error?: string;
  /** Set when the group did not complete */
  errorCode?: HarnessErrorCode;
}

export interface RunOutcome {
  results: ExecutionResult[];
  groups: GroupSummary[];
  cancelled: boolean;
  startedAt: number;
  finishedAt: number;
}

export interface ParallelRunnerOptions {
  /** Pool size W. Defaults to min(CPU count, 4). */
  workers?: number;
  /** Per-group wall-clock budget in milliseconds. */
  groupTimeoutMs?: number;
  /** A single policy for every unit, or a lookup table. */
  policies?: RetryPolicy | RetryPolicySet;
  retryHandler?: RetryHandler;
  logger?: Logger;
  now?: () => number;
}

export interface RunOptions {
  /** External stop signal; cancels every outstanding context. */
  signal?: AbortSignal;
}

export type RunnerEvent =
  | { type: 'group:start'; groupId: string; units: number; timestamp: number }
  | { type: 'group:end'; summary: GroupSummary; timestamp: number }
  | { type: 'unit:start'; groupId: string; testId: string; timestamp: number }
  | ({ type: 'unit:retry' } & RetryEvent)
  | { type: 'unit:end'; result: ExecutionResult }
  | { type: 'run:end'; outcome: RunOutcome };

type Supervision =
  | { kind: 'completed' }
  | { kind: 'crashed'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

/** Wrap a plain callback so every group gets its own executor object. */
export function fromCallback(callback: ScenarioCallback): ExecutorFactory {
  return () => ({ execute: callback });
}

function isPolicySet(value: RetryPolicy | RetryPolicySet): value is RetryPolicySet {
  return 'default' in value;
}

// =====================================================================
// ParallelTestRunner
// =====================================================================

/**
 * Executes groups under a fixed-size pool of isolated contexts.
 *
 * ```ts
 * const runner = new ParallelTestRunner(fromCallback(executeScenario), {
 *   workers: 2,
 *   groupTimeoutMs: 10 * 60_000,
 *   policies: { default: API_RETRY_POLICY, kinds: { ui: UI_RETRY_POLICY } },
 * });
 * runner.on('unit:end', (e) => console.log(e.result.testId, e.result.status));
 * const outcome = await runner.run(groups, { signal });
 * ```
 */
export class ParallelTestRunner extends EventEmitter {
  private readonly createExecutor: ExecutorFactory;
  private readonly workers: number;
  private readonly groupTimeoutMs: number;
  private readonly policies: RetryPolicySet;
  private readonly retryHandler: RetryHandler;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(createExecutor: ExecutorFactory, options?: ParallelRunnerOptions) {
    super();
    this.createExecutor = createExecutor;
    this.logger = options?.logger ?? silentLogger;
    this.workers = Math.max(1, Math.floor(options?.workers ?? Math.min(os.cpus().length, 4)));
    this.groupTimeoutMs = Math.min(Math.max(1, options?.groupTimeoutMs ?? DEFAULT_GROUP_TIMEOUT_MS), MAX_TIMER_MS);
    const policies = options?.policies ?? DEFAULT_RETRY_POLICY;
    this.policies = isPolicySet(policies) ? policies : { default: policies };
    this.retryHandler = options?.retryHandler ?? new RetryHandler({ logger: this.logger.child('retry') });
    this.now = options?.now ?? Date.now;
  }

  get poolSize(): number {
    return this.workers;
  }

  /**
   * Run every group and collect one ExecutionResult per unit per group.
   * Within a group results follow declaration order; groups appear in
   * declaration order in the returned list, whatever order they finished.
   */
  async run(groups: readonly TestGroup[], options?: RunOptions): Promise<RunOutcome> {
    const startedAt = this.now();
    const signal = options?.signal;
    const semaphore = new Semaphore(this.workers);

    this.logger.info('starting run', { groups: groups.length, workers: this.workers });

    const tasks = groups.map(async (group) => {
      await semaphore.acquire();
      try {
        return await this.runGroup(group, signal);
      } finally {
        semaphore.release();
      }
    });

    const settled = await Promise.all(tasks);

    const outcome: RunOutcome = {
      results: settled.flatMap((s) => s.results),
      groups: settled.map((s) => s.summary),
      cancelled: signal?.aborted ?? false,
      startedAt,
      finishedAt: this.now(),
    };

    this.logger.info('run finished', {
      results: outcome.results.length,
      passed: outcome.results.filter((r) => r.status === 'passed').length,
      cancelled: outcome.cancelled,
    });
    this.emitEvent({ type: 'run:end', outcome });
    return outcome;
  }

  // ----- Internal -----

  private async runGroup(
    group: TestGroup,
    signal: AbortSignal | undefined,
  ): Promise<{ results: ExecutionResult[]; summary: GroupSummary }> {
    const startedAt = this.now();
    const log = this.logger.child(group.id);

    const context = new GroupContext({
      group,
      createExecutor: this.createExecutor,
      policies: this.policies,
      retryHandler: this.retryHandler,
      logger: log,
      post: (message) => this.receive(message),
      now: this.now,
    });

    if (signal?.aborted) {
      const results = context.settle({ status: 'cancelled', reason: 'Run cancelled before group started' });
      return this.finishGroup(group, results, {
        groupId: group.id,
        state: 'cancelled',
        duration: 0,
        error: 'Run cancelled before group started',
        errorCode: 'RUN_CANCELLED',
      });
    }

    log.info('group started', { units: group.units.length });
    this.emitEvent({ type: 'group:start', groupId: group.id, units: group.units.length, timestamp: startedAt });

    const exit = await this.supervise(context, signal);
    let interruption: Interruption | undefined;
    let failure: HarnessError | undefined;

    switch (exit.kind) {
      case 'completed':
        break;
      case 'crashed': {
        const cause = toErrorMessage(exit.error);
        failure = new HarnessError('CONTEXT_CRASH', `Execution context crashed: ${cause}`, { groupId: group.id, cause });
        interruption = { status: 'error', reason: failure.message };
        log.error('execution context crashed', { error: cause, code: failure.code });
        break;
      }
      case 'timeout':
        failure = new HarnessError('GROUP_TIMEOUT', `Group exceeded its ${this.groupTimeoutMs}ms time budget`, {
          groupId: group.id,
          timeoutMs: this.groupTimeoutMs,
        });
        interruption = { status: 'timeout', reason: failure.message };
        log.warn('group timed out, terminating context', { timeoutMs: this.groupTimeoutMs });
        await context.terminate('timeout');
        break;
      case 'cancelled':
        failure = new HarnessError('RUN_CANCELLED', 'Run cancelled', { groupId: group.id });
        interruption = { status: 'cancelled', reason: failure.message };
        log.warn('run cancelled, terminating context');
        await context.terminate('cancelled');
        break;
    }

    const results = context.settle(interruption);
    return this.finishGroup(group, results, {
      groupId: group.id,
      state: exit.kind,
      duration: this.now() - startedAt,
      error: failure?.message,
      errorCode: failure?.code,
    });
  }

  /**
   * Wait for the context to finish, its time budget to run out, or the
   * external signal to fire, whichever happens first.
   */
  private supervise(context: GroupContext, signal: AbortSignal | undefined): Promise<Supervision> {
    return new Promise<Supervision>((resolve) => {
      let done = false;

      const finish = (result: Supervision): void => {
        if (done) return;
        done = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      const onAbort = (): void => finish({ kind: 'cancelled' });
      const timer = setTimeout(() => finish({ kind: 'timeout' }), this.groupTimeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      void context.run().then(finish);
    });
  }

  private finishGroup(
    group: TestGroup,
    results: ExecutionResult[],
    summary: GroupSummary,
  ): { results: ExecutionResult[]; summary: GroupSummary } {
    this.logger.child(group.id).info('group finished', {
      state: summary.state,
      passed: results.filter((r) => r.status === 'passed').length,
      total: results.length,
    });
    this.emitEvent({ type: 'group:end', summary, timestamp: this.now() });
    return { results, summary };
  }

  private receive(message: ContextMessage): void {
    this.emitEvent(message);
  }

  private emitEvent(event: RunnerEvent): void {
    this.emit('event', event);
    this.emit(event.type, event);
  }
}

/**
 * Simple counting semaphore for bounding concurrency. Waiters are served
 * in the order they called `acquire`.
 */
export class Semaphore {
  private count: number;
  private readonly queue: Array<() => void> = [];

  constructor(max: number) {
    this.count = max;
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.count++;
    }
  }
}
