/**
 * @module commands/init
 * `flaketrack init` — Initialize a new flaketrack project.
 *
 * Creates:
 * - flaketrack.yaml template configuration
 * - .env.example
 */

import type { Command } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { CliIO } from '../output.js';
import { bold, consoleIO, paint } from '../output.js';

const GREEN = '\x1b[32m';
const GRAY = '\x1b[90m';

// ── Template content ─────────────────────────────────────────────────

export const CONFIG_TEMPLATE = `version: "1"
project:
  name: my-project

runner:
  workers: 2
  groupTimeout: 30m

retry:
  default:
    preset: network
  kinds:
    ui:
      preset: ui
  # tags:
  #   payment:
  #     maxAttempts: 1

history:
  storage: local
  path: .flaketrack/history.db
  window: 10
  threshold: 0.2

# Without a groups section: smoke, api, ui and regression groups.
groups:
  - preset: smoke
  - kind: api
  - kind: ui

units:
  - id: health-check
    kind: api
    tags: ["@smoke"]
  - id: login-page
    kind: ui
    tags: ["@smoke", "@regression"]

executor:
  command: "npm test -- --grep {id}"
  timeout: 5m

logging:
  level: info
`;

const ENV_EXAMPLE = `# flaketrack environment variables
# Copy this file to .env and adjust values as needed.
# The executor command inherits these.

# BASE_URL=http://localhost:8080
`;

// ── Command ──────────────────────────────────────────────────────────

export async function initProject(dir: string, io: CliIO = consoleIO): Promise<number> {
  const baseDir = path.resolve(dir);
  await fs.mkdir(baseDir, { recursive: true });

  io.out(bold(io, '\nInitializing flaketrack project...\n'));

  const files: Array<[name: string, content: string]> = [
    ['flaketrack.yaml', CONFIG_TEMPLATE],
    ['.env.example', ENV_EXAMPLE],
  ];

  for (const [name, content] of files) {
    const target = path.join(baseDir, name);
    if (await fileExists(target)) {
      io.out(`  ${paint(io, 'skip', GRAY)}  ${name} (already exists)`);
    } else {
      await fs.writeFile(target, content, 'utf-8');
      io.out(`  ${paint(io, 'create', GREEN)}  ${name}`);
    }
  }

  io.out(`\n${paint(io, 'Done!', GREEN)} Edit ${bold(io, 'flaketrack.yaml')} to configure your project.\n`);
  return 0;
}

export function registerInit(program: Command): void {
  program
    .command('init')
    .description('Initialize a flaketrack project')
    .option('-d, --dir <directory>', 'Target directory', '.')
    .action(async (opts: { dir: string }) => {
      process.exitCode = await initProject(opts.dir);
    });
}

async function fileExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true, () => false);
}
