/**
 * @module commands/run
 * `flaketrack run` — Execute test groups.
 *
 * Steps:
 * 1. Load flaketrack.yaml
 * 2. Build units and groups (--group filter or all)
 * 3. Run groups in parallel with retries
 * 4. Record history and score the units that ran
 * 5. Print results; exit 1 when anything did not pass
 *
 * SIGINT cancels the run; partial results are still recorded.
 */

import type { Command } from 'commander';
import {
  ConsoleLogger,
  TestHarness,
  buildGroups,
  buildUnits,
  loadConfig,
} from 'flaketrack-core';
import type { ExecutorFactory, HistoryStore, TestGroup } from 'flaketrack-core';
import type { CliIO } from '../output.js';
import { bold, consoleIO, formatResultLine, formatScore, formatSummary, paint, statusColour } from '../output.js';
import type { GlobalOptions } from './shared.js';
import { parsePositiveInt, reportError } from './shared.js';

const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';

export interface RunCommandOptions extends GlobalOptions {
  /** Only run groups with these ids */
  group?: string[];
  workers?: number;
}

/** Collaborators a caller may supply instead of the configured ones. */
export interface RunDependencies {
  createExecutor?: ExecutorFactory;
  store?: HistoryStore;
  signal?: AbortSignal;
}

/** Run the configured groups. Resolves to the process exit code. */
export async function runTests(
  opts: RunCommandOptions,
  io: CliIO = consoleIO,
  deps: RunDependencies = {},
): Promise<number> {
  let harness: TestHarness;
  let groups: TestGroup[];

  try {
    const { config, projectDir } = await loadConfig(opts.config);
    const units = buildUnits(config.units);
    groups = selectGroups(buildGroups(units, config.groups), opts.group);

    const logger = new ConsoleLogger({
      scope: 'flaketrack',
      level: opts.verbose ? 'debug' : config.logging.level,
    });
    const runner = opts.workers !== undefined ? { ...config.runner, workers: opts.workers } : config.runner;
    harness = TestHarness.fromConfig({ ...config, runner }, {
      projectDir,
      logger,
      createExecutor: deps.createExecutor,
      store: deps.store,
    });
  } catch (err) {
    reportError(io, err);
    return 1;
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    io.err(paint(io, 'Cancelling run...', YELLOW));
    controller.abort();
  };
  const onExternalAbort = (): void => controller.abort();
  process.once('SIGINT', onSigint);
  if (deps.signal?.aborted) controller.abort();
  deps.signal?.addEventListener('abort', onExternalAbort, { once: true });

  io.out(bold(io, `\nRunning ${groups.length} group(s) with ${harness.runner.poolSize} worker(s)...\n`));

  try {
    const result = await harness.run(groups, { signal: controller.signal });

    for (const r of result.outcome.results) {
      io.out(paint(io, formatResultLine(r), statusColour(r.status)));
    }

    io.out('');
    io.out(bold(io, formatSummary(result.outcome.results)));

    const flaky = result.scores.filter((s) => s.classification === 'flaky');
    if (flaky.length > 0) {
      io.out(paint(io, `\nFlaky tests (${flaky.length}):`, YELLOW));
      for (const score of flaky) {
        io.out(`  ${formatScore(score)}`);
      }
    }

    if (result.recorded) {
      io.out(`History: ${result.recorded.records.length} record(s) saved as ${result.recorded.runId}`);
    } else {
      io.err(paint(io, 'History: results were not recorded', RED));
    }

    if (result.outcome.cancelled) {
      io.err(paint(io, 'Run was cancelled.', YELLOW));
    }

    return result.passed ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
    deps.signal?.removeEventListener('abort', onExternalAbort);
    if (!deps.store) harness.close();
  }
}

/**
 * Keep the groups named in `ids`, in declaration order.
 *
 * @throws {Error} when an id does not name a group
 */
export function selectGroups(groups: TestGroup[], ids?: readonly string[]): TestGroup[] {
  if (!ids || ids.length === 0) return groups;

  const known = new Set(groups.map((g) => g.id));
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown group(s): ${unknown.join(', ')}. Available groups: ${[...known].join(', ')}`,
    );
  }

  const wanted = new Set(ids);
  return groups.filter((g) => wanted.has(g.id));
}

export function registerRun(program: Command): void {
  program
    .command('run')
    .description('Run test groups in parallel and record their history')
    .option('-g, --group <id...>', 'Only run the given group ids')
    .option('-w, --workers <n>', 'Number of concurrent execution contexts', parsePositiveInt)
    .action(async (opts: RunCommandOptions) => {
      process.exitCode = await runTests({ ...program.opts<GlobalOptions>(), ...opts });
    });
}
