/**
 * @module program
 * Commander program for flaketrack.
 *
 * Registers all sub-commands; `index.ts` parses process.argv with it.
 */

import { Command } from 'commander';
import { registerInit } from './commands/init.js';
import { registerRun } from './commands/run.js';
import { registerFlaky } from './commands/flaky.js';
import { registerTrend } from './commands/trend.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('flaketrack')
    .description('Parallel test groups with retries and flakiness tracking')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to flaketrack.yaml')
    .option('--verbose', 'Enable debug logging');

  registerInit(program);
  registerRun(program);
  registerFlaky(program);
  registerTrend(program);

  return program;
}

export { runTests, selectGroups } from './commands/run.js';
export type { RunCommandOptions, RunDependencies } from './commands/run.js';
export { listFlaky } from './commands/flaky.js';
export type { FlakyCommandOptions } from './commands/flaky.js';
export { showTrend } from './commands/trend.js';
export type { TrendCommandOptions } from './commands/trend.js';
export { initProject, CONFIG_TEMPLATE } from './commands/init.js';
export type { CliIO } from './output.js';
