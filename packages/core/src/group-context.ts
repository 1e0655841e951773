/**
 * @module group-context
 * GroupContext — the isolated execution context that runs one TestGroup.
 *
 * Every context owns its own ScenarioExecutor (created by the factory for
 * this group only), its own AbortController and private copies of the
 * units it runs. It reports progress to the runner exclusively through
 * posted messages, and hands back its results once settled.
 */

import type {
  AttemptSummary,
  ExecutionResult,
  ExecutionStatus,
  ExecutorFactory,
  RetryPolicySet,
  ScenarioExecutor,
  TestGroup,
  TestUnit,
} from './types.js';
import type { Logger } from './logger.js';
import type { RetryEvent, RetryHandler } from './retry-engine.js';
import { resolveRetryPolicy } from './retry-engine.js';
import { HarnessError, toErrorMessage } from './errors.js';

/** Messages a context posts to its runner. */
export type ContextMessage =
  | { type: 'unit:start'; groupId: string; testId: string; timestamp: number }
  | ({ type: 'unit:retry' } & RetryEvent)
  | { type: 'unit:end'; result: ExecutionResult };

/** How a context's own run finished. */
export type ContextExit =
  | { kind: 'completed' }
  | { kind: 'crashed'; error: unknown };

/** Why the runner stopped a context from the outside. */
export type TerminationReason = 'timeout' | 'cancelled';

export interface GroupContextOptions {
  group: TestGroup;
  createExecutor: ExecutorFactory;
  policies: RetryPolicySet;
  retryHandler: RetryHandler;
  logger: Logger;
  post: (message: ContextMessage) => void;
  now?: () => number;
}

/** Attempts of the unit the context is working on, kept as they finish. */
interface InFlightUnit {
  unit: TestUnit;
  finished: AttemptSummary[];
  /** The attempt currently invoking the executor, if any */
  current: { attempt: number; startedAt: number } | null;
}

/** Status and reason used for units a context did not complete. */
export interface Interruption {
  status: Extract<ExecutionStatus, 'error' | 'timeout' | 'cancelled'>;
  reason: string;
}

export class GroupContext {
  private readonly group: TestGroup;
  private readonly options: GroupContextOptions;
  private readonly controller = new AbortController();
  private readonly now: () => number;
  private readonly completed: ExecutionResult[] = [];
  private inFlight: InFlightUnit | null = null;
  private executor: ScenarioExecutor | null = null;
  private closed = false;
  private disposed = false;

  constructor(options: GroupContextOptions) {
    this.group = options.group;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Run every unit of the group in declaration order.
   * Never rejects: a crash is reported as `{ kind: 'crashed' }`.
   */
  async run(): Promise<ContextExit> {
    const { group, retryHandler, policies, post } = this.options;
    const signal = this.controller.signal;

    try {
      const executor = await this.options.createExecutor(group);
      this.executor = executor;

      for (const unit of group.units) {
        if (this.closed) break;

        const isolated = cloneUnit(unit);
        const startedAt = this.now();
        const inFlight: InFlightUnit = { unit, finished: [], current: null };
        this.inFlight = inFlight;
        post({ type: 'unit:start', groupId: group.id, testId: unit.id, timestamp: startedAt });

        const result = await retryHandler.execute(
          () => executor.execute(isolated, signal),
          resolveRetryPolicy(unit, policies),
          { testId: unit.id, groupId: group.id },
          {
            signal,
            onAttemptStart: (attempt, timestamp) => {
              if (!this.closed) inFlight.current = { attempt, startedAt: timestamp };
            },
            onAttempt: (summary) => {
              if (this.closed) {
                this.options.logger.warn('executor settled after its context was terminated', {
                  group: group.id,
                  testId: unit.id,
                  attempt: summary.attempt,
                });
                return;
              }
              inFlight.finished.push(summary);
              inFlight.current = null;
            },
            onRetry: (event) => post({ type: 'unit:retry', ...event }),
          },
        );

        if (this.closed) break;
        this.inFlight = null;
        this.completed.push(result);
        post({ type: 'unit:end', result });
      }

      return { kind: 'completed' };
    } catch (error) {
      return { kind: 'crashed', error };
    } finally {
      await this.dispose();
    }
  }

  /**
   * Stop the context from outside: abort in-flight work and release the
   * executor. Results reported after this point are discarded.
   */
  async terminate(reason: TerminationReason): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.controller.abort(
      reason === 'timeout'
        ? new HarnessError('GROUP_TIMEOUT', `Group "${this.group.id}" timed out`, { groupId: this.group.id })
        : new HarnessError('RUN_CANCELLED', 'Run cancelled', { groupId: this.group.id }),
    );
    await this.dispose();
  }

  /**
   * Final results for the group: completed units as reported, then every
   * remaining unit marked with `interruption` (if any).
   *
   * An interrupted unit keeps the summaries of its finished attempts and
   * gets one more for the interruption. `attemptsUsed` counts only attempts
   * that reached the executor, so a unit that never started reports 0.
   */
  settle(interruption?: Interruption): ExecutionResult[] {
    this.closed = true;
    const results = [...this.completed];
    if (!interruption) return results;

    const timestamp = this.now();
    const remaining = this.group.units.slice(this.completed.length);
    for (const unit of remaining) {
      const inFlight = this.inFlight?.unit.id === unit.id ? this.inFlight : null;
      const finished = inFlight?.finished ?? [];
      const current = inFlight?.current ?? null;
      const elapsed = current ? timestamp - current.startedAt : 0;

      const attempts: AttemptSummary[] = [
        ...finished,
        {
          attempt: current?.attempt ?? finished.length + 1,
          status: interruption.status,
          duration: elapsed,
          timestamp: current?.startedAt ?? timestamp,
          error: interruption.reason,
        },
      ];

      results.push({
        testId: unit.id,
        groupId: this.group.id,
        status: interruption.status,
        duration: finished.reduce((sum, a) => sum + a.duration, 0) + elapsed,
        attemptsUsed: finished.length + (current ? 1 : 0),
        attempts,
        error: interruption.reason,
        timestamp,
      });
    }
    return results;
  }

  private async dispose(): Promise<void> {
    const executor = this.executor;
    if (this.disposed || !executor?.dispose) return;
    this.disposed = true;
    try {
      await executor.dispose();
    } catch (err) {
      this.options.logger.warn('executor dispose failed', { group: this.group.id, error: toErrorMessage(err) });
    }
  }
}

/** Executors never share unit objects across contexts. */
function cloneUnit(unit: TestUnit): TestUnit {
  return Object.freeze({ id: unit.id, kind: unit.kind, tags: new Set(unit.tags) });
}
