/**
 * @module harness
 * TestHarness — wires the parallel runner, the history recorder and the
 * flakiness analyzer into one post-run pipeline:
 *
 *   runner.run(groups) → recorder.record(results) → analyzer.analyze(ids)
 *
 * Nothing here is a module-level singleton; every collaborator is an
 * explicit instance owned by the harness.
 */

import type { ExecutionResult, ExecutorFactory, RetryPolicy, RetryPolicySet, TestGroup } from './types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { RunOutcome, RunOptions } from './parallel-engine.js';
import { ParallelTestRunner } from './parallel-engine.js';
import type { RetryStatistics } from './retry-engine.js';
import { summarizeRetries, toMilliseconds } from './retry-engine.js';
import type { HistoryStore } from './history/history-store.js';
import { createHistoryStore } from './history/history-store.js';
import { MemoryHistoryStore } from './history/memory-history-store.js';
import type { RecordRunResult } from './history/history-recorder.js';
import { HistoryRecorder } from './history/history-recorder.js';
import { FlakinessAnalyzer } from './history/flakiness-analyzer.js';
import type { FlakinessScore } from './history/types.js';
import type { FlaketrackConfig } from './config-loader.js';
import { buildPolicySet, toHistoryConfig } from './config-loader.js';
import { createExecExecutorFactory } from './runners/exec-executor.js';
import { HarnessError } from './errors.js';
import path from 'node:path';

export interface TestHarnessOptions {
  createExecutor: ExecutorFactory;
  /** Defaults to an in-memory store */
  store?: HistoryStore;
  workers?: number;
  groupTimeoutMs?: number;
  policies?: RetryPolicy | RetryPolicySet;
  /** Flakiness window K */
  window?: number;
  threshold?: number;
  logger?: Logger;
  now?: () => number;
}

export interface HarnessRunResult {
  outcome: RunOutcome;
  /** `null` when history could not be written */
  recorded: RecordRunResult | null;
  /** Scores of the units that ran, in first-seen order */
  scores: FlakinessScore[];
  retries: Map<string, RetryStatistics>;
  /** True when every result passed */
  passed: boolean;
}

export class TestHarness {
  readonly runner: ParallelTestRunner;
  readonly recorder: HistoryRecorder;
  readonly analyzer: FlakinessAnalyzer;
  readonly store: HistoryStore;
  private readonly logger: Logger;

  constructor(options: TestHarnessOptions) {
    this.logger = options.logger ?? silentLogger;
    this.store = options.store ?? new MemoryHistoryStore();
    this.runner = new ParallelTestRunner(options.createExecutor, {
      workers: options.workers,
      groupTimeoutMs: options.groupTimeoutMs,
      policies: options.policies,
      logger: this.logger.child('runner'),
      now: options.now,
    });
    this.recorder = new HistoryRecorder(this.store, {
      logger: this.logger.child('history'),
      now: options.now,
    });
    this.analyzer = new FlakinessAnalyzer(this.store, {
      window: options.window,
      threshold: options.threshold,
      now: options.now,
    });
  }

  /**
   * Build a harness from a validated configuration. Without an explicit
   * `createExecutor`, the `executor` section must be present; without an
   * explicit `store`, one is opened from the `history` section.
   *
   * @throws {HarnessError} CONFIG_INVALID when no executor is available
   */
  static fromConfig(
    config: FlaketrackConfig,
    options: { projectDir: string; logger?: Logger; createExecutor?: ExecutorFactory; store?: HistoryStore },
  ): TestHarness {
    const logger = options.logger ?? silentLogger;
    const createExecutor = options.createExecutor ?? executorFromConfig(config, options.projectDir);
    const history = toHistoryConfig(config, options.projectDir);

    return new TestHarness({
      createExecutor,
      store: options.store ?? createHistoryStore(history, options.projectDir, logger.child('history')),
      workers: config.runner.workers,
      groupTimeoutMs: config.runner.groupTimeout !== undefined
        ? toMilliseconds(config.runner.groupTimeout)
        : undefined,
      policies: buildPolicySet(config.retry, logger.child('config')),
      window: history.window,
      threshold: history.threshold,
      logger,
    });
  }

  /** Run, record, then score every unit that ran. */
  async run(groups: readonly TestGroup[], options?: RunOptions): Promise<HarnessRunResult> {
    const outcome = await this.runner.run(groups, options);
    const recorded = this.recorder.record(outcome.results);

    const scores: FlakinessScore[] = [];
    for (const testId of uniqueTestIds(outcome.results)) {
      const score = this.analyzer.analyze(testId);
      if (score) scores.push(score);
    }

    const flaky = scores.filter((s) => s.classification === 'flaky');
    if (flaky.length > 0) {
      this.logger.warn('flaky tests detected', { count: flaky.length, tests: flaky.map((s) => s.testId).join(',') });
    }

    return {
      outcome,
      recorded,
      scores,
      retries: summarizeRetries(outcome.results),
      passed: outcome.results.every((r) => r.status === 'passed'),
    };
  }

  close(): void {
    this.store.close();
  }
}

function uniqueTestIds(results: readonly ExecutionResult[]): string[] {
  return [...new Set(results.map((r) => r.testId))];
}

function executorFromConfig(config: FlaketrackConfig, projectDir: string): ExecutorFactory {
  const executor = config.executor;
  if (!executor) {
    throw new HarnessError('CONFIG_INVALID', 'No executor configured: add an `executor.command` section', {
      field: 'executor',
    });
  }
  return createExecExecutorFactory({
    command: executor.command,
    cwd: executor.cwd !== undefined ? path.resolve(projectDir, executor.cwd) : projectDir,
    env: executor.env,
    timeoutMs: executor.timeout !== undefined ? toMilliseconds(executor.timeout) : undefined,
  });
}
