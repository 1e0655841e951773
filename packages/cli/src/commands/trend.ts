/**
 * @module commands/trend
 * `flaketrack trend <testId>` — Print a test unit's status series.
 */

import type { Command } from 'commander';
import {
  ConsoleLogger,
  FlakinessAnalyzer,
  createHistoryStore,
  loadConfig,
  toHistoryConfig,
} from 'flaketrack-core';
import type { HistoryStore } from 'flaketrack-core';
import type { CliIO } from '../output.js';
import { bold, consoleIO, formatScore, formatTrendPoint, paint, statusColour } from '../output.js';
import type { GlobalOptions } from './shared.js';
import { parsePositiveInt, reportError } from './shared.js';

export interface TrendCommandOptions extends GlobalOptions {
  /** Number of recent records; defaults to the configured window */
  window?: number;
  /** Also print the daily pass rate over this many days */
  days?: number;
}

/** Print the series and current score. Resolves to the process exit code. */
export async function showTrend(
  testId: string,
  opts: TrendCommandOptions,
  io: CliIO = consoleIO,
  deps: { store?: HistoryStore } = {},
): Promise<number> {
  let store: HistoryStore;
  let analyzer: FlakinessAnalyzer;

  try {
    const { config, projectDir } = await loadConfig(opts.config);
    const history = toHistoryConfig(config, projectDir);
    const logger = new ConsoleLogger({ scope: 'history', level: opts.verbose ? 'debug' : config.logging.level });
    store = deps.store ?? createHistoryStore(history, projectDir, logger);
    analyzer = new FlakinessAnalyzer(store, { window: history.window, threshold: history.threshold });
  } catch (err) {
    reportError(io, err);
    return 1;
  }

  try {
    const points = [...analyzer.trend(testId, opts.window)];
    if (points.length === 0) {
      io.out(`No history for "${testId}".`);
      return 0;
    }

    io.out(bold(io, `Trend for ${testId} (${points.length} run(s)):`));
    for (const point of points) {
      io.out(`  ${paint(io, formatTrendPoint(point), statusColour(point.status))}`);
    }

    const score = analyzer.analyze(testId);
    if (score) {
      io.out(`\n${formatScore(score)}`);
      io.out(score.suggestion);
    }

    if (opts.days !== undefined) {
      io.out(bold(io, `\nDaily pass rate (last ${opts.days} day(s)):`));
      for (const day of analyzer.dailyPassRate(testId, opts.days)) {
        io.out(`  ${day.date} ${day.value}% (${day.runCount} run(s))`);
      }
    }
    return 0;
  } finally {
    if (!deps.store) store.close();
  }
}

export function registerTrend(program: Command): void {
  program
    .command('trend')
    .description("Print a test unit's recent status series")
    .argument('<testId>', 'Test unit id')
    .option('--window <n>', 'Number of recent runs to show', parsePositiveInt)
    .option('--days <n>', 'Also print the daily pass rate over n days', parsePositiveInt)
    .action(async (testId: string, opts: TrendCommandOptions) => {
      process.exitCode = await showTrend(testId, { ...program.opts<GlobalOptions>(), ...opts });
    });
}
