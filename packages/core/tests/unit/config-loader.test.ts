/**
 * Unit tests for config-loader module.
 *
 * Tests cover:
 * - Valid configuration loading and default values
 * - .env file loading
 * - Invalid configuration and YAML error reporting
 * - File-not-found handling and config file discovery
 * - Runtime builders (policies, units, groups, history)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import {
  buildGroups,
  buildPolicySet,
  buildRetryPolicy,
  buildUnits,
  loadConfig,
  parseConfig,
  resolveConfigPath,
  toHistoryConfig,
} from '../../src/config-loader.js';
import { isHarnessError } from '../../src/errors.js';
import { retryAll } from '../../src/retry-engine.js';
import { RecordingLogger } from './helpers.js';

/** Helper to create a temporary directory */
async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'flaketrack-config-test-'));
}

/** Minimal valid YAML config */
function minimalYaml(): string {
  return [
    'project:',
    '  name: test-project',
    'units:',
    '  - id: health',
    '    kind: api',
    '    tags: ["@smoke"]',
  ].join('\n');
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  return undefined;
}

function catchSync(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    delete process.env.FLAKETRACK_TEST_TOKEN;
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads a minimal config and fills in defaults', async () => {
    const configPath = path.join(tmpDir, 'flaketrack.yaml');
    await fs.writeFile(configPath, minimalYaml());

    const loaded = await loadConfig(configPath);

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.projectDir).toBe(tmpDir);
    expect(loaded.config.version).toBe('1');
    expect(loaded.config.project.name).toBe('test-project');
    expect(loaded.config.units).toEqual([{ id: 'health', kind: 'api', tags: ['@smoke'] }]);
    expect(loaded.config.history).toEqual({ enabled: true, storage: 'local', window: 10, threshold: 0.2 });
    expect(loaded.config.retry).toEqual({ kinds: {}, tags: {}, tests: {} });
    expect(loaded.config.logging.level).toBe('info');
    expect(loaded.config.groups).toBeUndefined();
  });

  it('loads the .env file next to the config', async () => {
    const configPath = path.join(tmpDir, 'flaketrack.yaml');
    await fs.writeFile(configPath, minimalYaml());
    await fs.writeFile(path.join(tmpDir, '.env'), 'FLAKETRACK_TEST_TOKEN=test-secret\n');

    await loadConfig(configPath);

    expect(process.env.FLAKETRACK_TEST_TOKEN).toBe('test-secret');
  });

  it('reports a missing file as CONFIG_NOT_FOUND', async () => {
    const err = await catchError(loadConfig(path.join(tmpDir, 'missing.yaml')));
    expect(isHarnessError(err, 'CONFIG_NOT_FOUND')).toBe(true);
  });

  it('reports YAML syntax errors as CONFIG_INVALID', async () => {
    const configPath = path.join(tmpDir, 'flaketrack.yaml');
    await fs.writeFile(configPath, 'project: [unclosed');

    const err = await catchError(loadConfig(configPath));

    expect(isHarnessError(err, 'CONFIG_INVALID')).toBe(true);
    expect(err instanceof Error && err.message.startsWith(`YAML syntax error in ${configPath}`)).toBe(true);
  });

  it('rejects an empty file', async () => {
    const configPath = path.join(tmpDir, 'flaketrack.yaml');
    await fs.writeFile(configPath, '');

    await expect(loadConfig(configPath)).rejects.toThrow(
      `Configuration file is empty or not a valid object: ${configPath}`,
    );
  });
});

describe('resolveConfigPath', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('resolves an explicit path against cwd', async () => {
    expect(await resolveConfigPath('conf/ft.yaml', tmpDir)).toBe(path.join(tmpDir, 'conf', 'ft.yaml'));
  });

  it('falls back to flaketrack.yml', async () => {
    await fs.writeFile(path.join(tmpDir, 'flaketrack.yml'), minimalYaml());
    expect(await resolveConfigPath(undefined, tmpDir)).toBe(path.join(tmpDir, 'flaketrack.yml'));
  });

  it('throws CONFIG_NOT_FOUND when neither file exists', async () => {
    const err = await catchError(resolveConfigPath(undefined, tmpDir));
    expect(isHarnessError(err, 'CONFIG_NOT_FOUND')).toBe(true);
  });
});

describe('parseConfig', () => {
  it('lists every failing field', () => {
    const err = catchSync(() => parseConfig({ history: { threshold: 2 } }));

    expect(isHarnessError(err, 'CONFIG_INVALID')).toBe(true);
    const message = err instanceof Error ? err.message : '';
    expect(message).toContain('  - project: Required');
    expect(message).toContain('  - history.threshold: ');
  });

  it('rejects malformed durations', () => {
    const err = catchSync(() => parseConfig({ project: { name: 'p' }, retry: { default: { delay: 'soon' } } }));

    expect(isHarnessError(err, 'CONFIG_INVALID')).toBe(true);
    expect(err instanceof Error ? err.message : '').toContain('retry.default.delay');
  });

  it('accepts numeric and string durations', () => {
    const config = parseConfig({
      project: { name: 'p' },
      runner: { workers: 2, groupTimeout: '10m' },
      retry: { default: { delay: 1.5 } },
    });

    expect(config.runner).toEqual({ workers: 2, groupTimeout: '10m' });
    expect(config.retry.default?.delay).toBe(1.5);
  });
});

describe('buildRetryPolicy', () => {
  it('starts from a preset and overrides fields', () => {
    const policy = buildRetryPolicy({ preset: 'ui', delay: '500ms' });

    expect(policy.maxAttempts).toBe(2);
    expect(policy.delayMs).toBe(500);
    expect(policy.exponentialBackoff).toBe(false);
    expect(policy.isRetryable).toBe(retryAll);
  });

  it('reads numeric delays as seconds', () => {
    const policy = buildRetryPolicy({ delay: 2, maxDelay: 10 });
    expect(policy.delayMs).toBe(2000);
    expect(policy.maxDelayMs).toBe(10_000);
  });

  it('reads unit-less delay strings as seconds', () => {
    const config = parseConfig({ project: { name: 'p' }, retry: { default: { delay: '5', maxDelay: '30' } } });
    const policy = buildRetryPolicy(config.retry.default ?? {});
    expect(policy.delayMs).toBe(5000);
    expect(policy.maxDelayMs).toBe(30_000);
  });

  it('clamps out-of-range values with a warning', () => {
    const logger = new RecordingLogger();
    const policy = buildRetryPolicy({ maxAttempts: 0 }, logger);

    expect(policy.maxAttempts).toBe(1);
    expect(logger.messages('warn')).toEqual(['maxAttempts must be at least 1; clamping to 1']);
  });
});

describe('buildPolicySet', () => {
  it('builds policies per kind, tag and test id', () => {
    const config = parseConfig({
      project: { name: 'p' },
      retry: {
        default: { maxAttempts: 5, delay: 2 },
        kinds: { ui: { preset: 'ui' } },
        tags: { '@payment': { preset: 'none' } },
        tests: { login: { retryOn: ['ECONN'], delay: '250ms' } },
      },
    });

    const set = buildPolicySet(config.retry);

    expect(set.default.maxAttempts).toBe(5);
    expect(set.default.delayMs).toBe(2000);
    expect(set.default.exponentialBackoff).toBe(true);
    expect(set.kinds?.ui?.maxAttempts).toBe(2);
    expect(set.kinds?.api).toBeUndefined();
    expect(Object.keys(set.tags ?? {})).toEqual(['payment']);
    expect(set.tags?.payment?.maxAttempts).toBe(1);

    const login = set.tests?.login;
    expect(login?.delayMs).toBe(250);
    expect(login?.isRetryable({ status: 'failed', message: 'connect econnrefused 127.0.0.1:9' })).toBe(true);
    expect(login?.isRetryable({ status: 'failed', message: 'expected 1 to equal 2' })).toBe(false);
  });
});

describe('buildUnits / buildGroups', () => {
  const units = buildUnits([
    { id: 'health', kind: 'api', tags: ['@smoke'] },
    { id: 'login', kind: 'ui', tags: ['smoke', 'regression'] },
    { id: 'report', kind: 'other', tags: ['regression'] },
  ]);

  it('normalizes tags on units', () => {
    expect([...(units[0]?.tags ?? [])]).toEqual(['smoke']);
  });

  it('builds groups in list order', () => {
    const config = parseConfig({
      project: { name: 'p' },
      groups: [
        { kind: 'api' },
        { tag: 'smoke', id: 'quick' },
        { tags: ['smoke', 'regression'], match: 'all' },
        { balanced: 2 },
        { preset: 'regression' },
      ],
    });

    const groups = buildGroups(units, config.groups);

    expect(groups.map((g) => [g.id, g.units.map((u) => u.id)])).toEqual([
      ['kind:api', ['health']],
      ['quick', ['health', 'login']],
      ['tags:smoke+regression', ['login']],
      ['balanced:1', ['health', 'report']],
      ['balanced:2', ['login']],
      ['tag:regression', ['login', 'report']],
    ]);
  });

  it('uses the default groups without a groups section', () => {
    expect(buildGroups(units).map((g) => g.id)).toEqual(['tag:smoke', 'kind:api', 'kind:ui', 'tag:regression']);
  });
});

describe('toHistoryConfig', () => {
  it('resolves the database path against the project directory', () => {
    const config = parseConfig({ project: { name: 'p' }, history: { path: 'data/history.db', window: 20 } });

    expect(toHistoryConfig(config, '/srv/project')).toEqual({
      enabled: true,
      storage: 'local',
      path: path.resolve('/srv/project', 'data/history.db'),
      window: 20,
      threshold: 0.2,
    });
  });
});
