/**
 * @module commands/flaky
 * `flaketrack flaky` — List flakiness scores from the recorded history.
 */

import type { Command } from 'commander';
import { Option } from 'commander';
import {
  ConsoleLogger,
  FlakinessAnalyzer,
  createHistoryStore,
  loadConfig,
  toHistoryConfig,
} from 'flaketrack-core';
import type { FlakinessScore, HistoryStore, StabilityClass } from 'flaketrack-core';
import type { CliIO } from '../output.js';
import { bold, consoleIO, formatScore } from '../output.js';
import type { GlobalOptions } from './shared.js';
import { parsePositiveInt, parseRatio, reportError } from './shared.js';

export interface FlakyCommandOptions extends GlobalOptions {
  /** Minimum instability ratio */
  min?: number;
  top?: number;
  classification?: StabilityClass;
  json?: boolean;
}

/** Print scores, most unstable first. Resolves to the process exit code. */
export async function listFlaky(
  opts: FlakyCommandOptions,
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
    const scores: FlakinessScore[] = analyzer.analyzeAll({
      minRatio: opts.min,
      topN: opts.top,
      classification: opts.classification,
    });

    if (opts.json) {
      io.out(JSON.stringify(scores, null, 2));
      return 0;
    }

    if (scores.length === 0) {
      io.out('No matching history recorded yet.');
      return 0;
    }

    io.out(bold(io, `${scores.length} test unit(s):`));
    for (const score of scores) {
      io.out(`  ${formatScore(score)}`);
      if (score.classification === 'flaky') {
        io.out(`    ${score.suggestion}`);
      }
    }
    return 0;
  } finally {
    if (!deps.store) store.close();
  }
}

export function registerFlaky(program: Command): void {
  program
    .command('flaky')
    .description('List flakiness scores from the recorded history')
    .option('--min <ratio>', 'Only show units with at least this instability ratio', parseRatio)
    .option('--top <n>', 'Show at most n units', parsePositiveInt)
    .addOption(
      new Option('--classification <class>', 'Only show one stability class')
        .choices(['stable-pass', 'stable-fail', 'flaky']),
    )
    .option('--json', 'Print scores as JSON')
    .action(async (opts: FlakyCommandOptions) => {
      process.exitCode = await listFlaky({ ...program.opts<GlobalOptions>(), ...opts });
    });
}
