/**
 * CLI tests for flaketrack.
 *
 * Tests cover:
 * - Program commands and version
 * - run: results, summary, flaky list, history, group selection, errors
 * - flaky: score listing, JSON output, empty history
 * - trend: status series and score
 * - init: project files, no overwrite
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { MemoryHistoryStore, fromCallback, loadConfig } from 'flaketrack-core';
import type { HistoricalRecord, ScenarioOutcome } from 'flaketrack-core';
import { createProgram, initProject, listFlaky, runTests, showTrend } from '../src/program.js';

function collectingIO() {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    out: (line: string) => lines.push(line),
    err: (line: string) => errors.push(line),
    color: false,
    lines,
    errors,
  };
}

const CONFIG = [
  'project:',
  '  name: shop',
  'runner:',
  '  workers: 2',
  'retry:',
  '  default:',
  '    preset: none',
  'history:',
  '  storage: memory',
  'groups:',
  '  - kind: api',
  '  - kind: ui',
  'units:',
  '  - id: health',
  '    kind: api',
  '  - id: orders',
  '    kind: api',
  '  - id: login',
  '    kind: ui',
  'logging:',
  '  level: error',
].join('\n');

const ok = (duration = 10): ScenarioOutcome => ({ status: 'passed', duration });
const fail = (message: string, duration = 10): ScenarioOutcome => ({ status: 'failed', duration, failure: { message } });

function records(testId: string, statuses: HistoricalRecord['status'][], start: number): HistoricalRecord[] {
  return statuses.map((status, i) => ({
    runId: `run-${i}`,
    testId,
    timestamp: start + i * 86_400_000,
    status,
    duration: 100,
    attemptsUsed: 1,
  }));
}

let tmpDir: string;
let configPath: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'flaketrack-cli-test-'));
  configPath = path.join(tmpDir, 'flaketrack.yaml');
  await fs.writeFile(configPath, CONFIG, 'utf-8');
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('program', () => {
  it('registers every command', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['init', 'run', 'flaky', 'trend']);
  });

  it('reports its version', () => {
    expect(createProgram().version()).toBe('0.1.0');
  });
});

describe('run', () => {
  it('prints results and a summary, and fails when a unit fails', async () => {
    const io = collectingIO();
    const store = new MemoryHistoryStore();

    const code = await runTests({ config: configPath }, io, {
      store,
      createExecutor: fromCallback(async (u) => (u.id === 'orders' ? fail('expected 2 items\nat orders.spec') : ok())),
    });

    expect(code).toBe(1);
    expect(io.lines[0]).toBe('\nRunning 2 group(s) with 2 worker(s)...\n');
    expect(io.lines).toContain('PASSED    health [kind:api] 10ms');
    expect(io.lines).toContain('FAILED    orders [kind:api] 10ms\n          expected 2 items');
    expect(io.lines).toContain('Summary: 2 passed, 1 failed (3 results)');
    expect(io.lines.at(-1)).toMatch(/^History: 3 record\(s\) saved as run-\d+-[a-z0-9]+$/);
    expect(store.testIds()).toEqual(['health', 'login', 'orders']);
  });

  it('lists units that became flaky', async () => {
    const store = new MemoryHistoryStore();
    let round = 0;
    const createExecutor = fromCallback(async (u) => (u.id === 'login' && round === 1 ? fail('element not found') : ok()));

    await runTests({ config: configPath }, collectingIO(), { store, createExecutor });
    round = 1;
    const io = collectingIO();
    await runTests({ config: configPath }, io, { store, createExecutor });

    expect(io.lines).toContain('\nFlaky tests (1):');
    expect(io.lines).toContain('  flaky       login ratio=1.00 runs=2 retried=0%');
  });

  it('passes with exit code 0 and runs only the selected groups', async () => {
    const io = collectingIO();

    const code = await runTests({ config: configPath, group: ['kind:ui'], workers: 1 }, io, {
      store: new MemoryHistoryStore(),
      createExecutor: fromCallback(async () => ok(1500)),
    });

    expect(code).toBe(0);
    expect(io.lines[0]).toBe('\nRunning 1 group(s) with 1 worker(s)...\n');
    expect(io.lines).toContain('PASSED    login [kind:ui] 1.5s');
    expect(io.lines).toContain('Summary: 1 passed (1 results)');
  });

  it('rejects unknown group ids', async () => {
    const io = collectingIO();

    const code = await runTests({ config: configPath, group: ['nightly'] }, io, { store: new MemoryHistoryStore() });

    expect(code).toBe(1);
    expect(io.errors).toEqual(['Error: Unknown group(s): nightly. Available groups: kind:api, kind:ui']);
  });

  it('reports a missing config with suggested actions', async () => {
    const io = collectingIO();
    const missing = path.join(tmpDir, 'nope.yaml');

    const code = await runTests({ config: missing }, io);

    expect(code).toBe(1);
    expect(io.errors).toEqual([
      `Error [CONFIG_NOT_FOUND]: Configuration file not found: ${missing}`,
      '  → Pass --config <path>',
      '  → Create flaketrack.yaml in the working directory',
    ]);
  });

  it('cancels when the external signal fires', async () => {
    const controller = new AbortController();
    controller.abort();
    const io = collectingIO();

    const code = await runTests({ config: configPath }, io, {
      store: new MemoryHistoryStore(),
      signal: controller.signal,
      createExecutor: fromCallback(async () => ok()),
    });

    expect(code).toBe(1);
    expect(io.lines).toContain('Summary: 0 passed, 3 cancelled (3 results)');
    expect(io.errors).toEqual(['Run was cancelled.']);
  });
});

describe('flaky', () => {
  it('lists scores with suggestions for flaky units', async () => {
    const store = new MemoryHistoryStore();
    store.append(records('checkout', ['passed', 'failed', 'passed', 'passed', 'failed'], 1_000));
    store.append(records('health', ['passed', 'passed', 'passed'], 1_000));
    const io = collectingIO();

    const code = await listFlaky({ config: configPath }, io, { store });

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      '2 test unit(s):',
      '  flaky       checkout ratio=0.75 runs=5 retried=0%',
      '    Outcome changed 3 times in 5 runs (75% instability). Investigate timing-dependent assertions and external dependencies.',
      '  stable-pass health ratio=0.00 runs=3 retried=0%',
    ]);
  });

  it('filters and prints JSON', async () => {
    const store = new MemoryHistoryStore();
    store.append(records('checkout', ['passed', 'failed'], 1_000));
    store.append(records('health', ['passed', 'passed'], 1_000));
    const io = collectingIO();

    await listFlaky({ config: configPath, classification: 'flaky', json: true }, io, { store });

    const parsed: unknown = JSON.parse(io.lines.join('\n'));
    expect(Array.isArray(parsed) ? parsed.length : -1).toBe(1);
    expect(io.lines.join('\n')).toContain('"testId": "checkout"');
  });

  it('says so when there is no history', async () => {
    const io = collectingIO();
    await listFlaky({ config: configPath }, io, { store: new MemoryHistoryStore() });
    expect(io.lines).toEqual(['No matching history recorded yet.']);
  });
});

describe('trend', () => {
  it('prints the series and the current score', async () => {
    const store = new MemoryHistoryStore();
    store.append(records('checkout', ['passed', 'failed'], Date.UTC(2026, 0, 1)));
    const io = collectingIO();

    const code = await showTrend('checkout', { config: configPath }, io, { store });

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      'Trend for checkout (2 run(s)):',
      '  2026-01-01T00:00:00.000Z passed',
      '  2026-01-02T00:00:00.000Z failed',
      '\nflaky       checkout ratio=1.00 runs=2 retried=0%',
      'Outcome changed 1 times in 2 runs (100% instability). Investigate timing-dependent assertions and external dependencies.',
    ]);
  });

  it('handles unknown units', async () => {
    const io = collectingIO();
    await showTrend('ghost', { config: configPath }, io, { store: new MemoryHistoryStore() });
    expect(io.lines).toEqual(['No history for "ghost".']);
  });
});

describe('init', () => {
  it('creates a loadable config and .env.example', async () => {
    const dir = path.join(tmpDir, 'new-project');
    const io = collectingIO();

    await initProject(dir, io);

    expect(io.lines).toContain('  create  flaketrack.yaml');
    expect(io.lines).toContain('  create  .env.example');
    const loaded = await loadConfig(path.join(dir, 'flaketrack.yaml'));
    expect(loaded.config.project.name).toBe('my-project');
    expect(loaded.config.units.map((u) => u.id)).toEqual(['health-check', 'login-page']);
  });

  it('does not overwrite existing files', async () => {
    const io = collectingIO();

    await initProject(tmpDir, io);

    expect(io.lines).toContain('  skip  flaketrack.yaml (already exists)');
    expect(await fs.readFile(configPath, 'utf-8')).toBe(CONFIG);
  });
});
