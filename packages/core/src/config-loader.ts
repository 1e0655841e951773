/**
 * @module config-loader
 * Configuration loader for flaketrack.
 *
 * Loads `flaketrack.yaml` configuration files, validates them with Zod
 * schemas, loads the `.env` file next to them, and turns the validated
 * sections into runtime objects (units, groups, retry policies).
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import type { RetryPolicy, RetryPolicySet, RetryPredicate, TestGroup, TestKind, TestUnit } from './types.js';
import type { HistoryConfig } from './history/types.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { HarnessError, toErrorMessage } from './errors.js';
import {
  API_RETRY_POLICY,
  DEFAULT_RETRY_POLICY,
  NETWORK_RETRY_POLICY,
  NO_RETRY_POLICY,
  UI_RETRY_POLICY,
  isTransientFailure,
  matchFailures,
  normalizeRetryPolicy,
  parseDelay,
  retryAll,
  retryNone,
  toMilliseconds,
} from './retry-engine.js';
import { TestGroupBuilder, createDefaultGroups, createTestUnit } from './group-builder.js';

export const CONFIG_FILE_NAMES = ['flaketrack.yaml', 'flaketrack.yml'] as const;

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

function isDelayString(value: string): boolean {
  try {
    parseDelay(value);
    return true;
  } catch {
    return false;
  }
}

/** Duration: seconds as a number or unit-less string, or a string such as "1.5s" or "500ms" */
export const DurationSchema = z.union([
  z.number(),
  z.string().refine(isDelayString, { message: 'Expected a duration such as "2s" or "500ms"' }),
]).describe('Duration in seconds, or a string with a unit (ms, s, m, h); a bare number string is seconds');

const TestKindSchema = z.enum(['api', 'ui', 'other']);

/** Retry policy schema. Numeric fields are clamped later, not rejected. */
export const RetryPolicySchema = z.object({
  preset: z.enum(['default', 'network', 'api', 'ui', 'none']).optional()
    .describe('Built-in policy to start from'),
  maxAttempts: z.number().optional().describe('Maximum attempts including the first'),
  delay: DurationSchema.optional().describe('Base delay between attempts'),
  exponentialBackoff: z.boolean().optional().describe('Double the delay after every failed attempt'),
  maxDelay: DurationSchema.optional().describe('Upper bound on a single delay'),
  retryOn: z.union([
    z.enum(['transient', 'all', 'none']),
    z.array(z.string()).min(1),
  ]).optional().describe('Which failures are retried: a class, or regular expressions matched against the failure'),
}).describe('Retry policy');

export const RetryConfigSchema = z.object({
  default: RetryPolicySchema.optional(),
  kinds: z.object({
    api: RetryPolicySchema.optional(),
    ui: RetryPolicySchema.optional(),
    other: RetryPolicySchema.optional(),
  }).default({}).describe('Policies per test kind'),
  tags: z.record(RetryPolicySchema).default({}).describe('Policies per tag (without "@")'),
  tests: z.record(RetryPolicySchema).default({}).describe('Policies per test id'),
}).describe('Retry policies; the most specific entry wins');

const GroupBaseSchema = z.object({
  id: z.string().optional().describe('Group identifier'),
  strategy: z.string().optional().describe('Execution strategy tag'),
});

/** One entry of the `groups` list */
export const GroupSchema = z.union([
  GroupBaseSchema.extend({ kind: TestKindSchema }),
  GroupBaseSchema.extend({ tag: z.string() }),
  GroupBaseSchema.extend({ tags: z.array(z.string()).min(1), match: z.enum(['any', 'all']).default('any') }),
  z.object({ balanced: z.number().int().min(1), strategy: z.string().optional() }),
  z.object({ preset: z.enum(['smoke', 'regression', 'default']) }),
]).describe('Group selection');

export const UnitSchema = z.object({
  id: z.string().min(1).describe('Unique test unit identifier'),
  kind: TestKindSchema.default('other'),
  tags: z.array(z.string()).default([]),
}).describe('Test unit');

export const HistorySchema = z.object({
  enabled: z.boolean().default(true),
  storage: z.enum(['local', 'memory']).default('local'),
  path: z.string().optional().describe('SQLite file, relative to the config file'),
  window: z.number().int().min(1).default(10).describe('Records analyzed per test unit'),
  threshold: z.number().min(0).max(1).default(0.2).describe('Instability ratio above which a unit is flaky'),
}).describe('Execution history & flakiness analysis');

export const ExecutorSchema = z.object({
  command: z.string().min(1).describe('Command template; {id}, {kind} and {tags} are substituted'),
  cwd: z.string().optional().describe('Working directory, relative to the config file'),
  env: z.record(z.string()).optional(),
  timeout: DurationSchema.optional().describe('Per-invocation time limit'),
}).describe('Shell scenario executor');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const FlaketrackConfigSchema = z.object({
  version: z.string().default('1').describe('Configuration schema version'),
  project: z.object({
    name: z.string().describe('Project name'),
    description: z.string().optional(),
  }).describe('Project metadata'),
  runner: z.object({
    workers: z.number().int().min(1).optional().describe('Concurrent execution contexts'),
    groupTimeout: DurationSchema.optional().describe('Wall-clock budget per group'),
  }).default({}),
  retry: RetryConfigSchema.default({}),
  history: HistorySchema.default({}),
  groups: z.array(GroupSchema).optional().describe('Defaults to smoke, api, ui and regression groups'),
  units: z.array(UnitSchema).default([]),
  executor: ExecutorSchema.optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
}).describe('flaketrack configuration');

export type FlaketrackConfig = z.infer<typeof FlaketrackConfigSchema>;
export type RetryPolicyConfig = z.infer<typeof RetryPolicySchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type GroupConfig = z.infer<typeof GroupSchema>;
export type UnitConfig = z.infer<typeof UnitSchema>;

export interface LoadedConfig {
  config: FlaketrackConfig;
  /** Absolute path of the file that was read */
  configPath: string;
  /** Directory relative paths in the config resolve against */
  projectDir: string;
}

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Validate an already-parsed configuration object.
 *
 * @throws {HarnessError} CONFIG_INVALID listing every failing field
 */
export function parseConfig(raw: unknown): FlaketrackConfig {
  const result = FlaketrackConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const text = issues.map((issue) => `  - ${issue.path || '(root)'}: ${issue.message}`).join('\n');
    throw new HarnessError('CONFIG_INVALID', `Configuration validation failed:\n${text}`, { issues });
  }
  return result.data;
}

/**
 * Load and validate a flaketrack configuration file.
 *
 * Steps:
 * 1. Load `.env` from the config file's directory
 * 2. Read and parse the YAML file
 * 3. Validate with the Zod schema
 *
 * @param configPath - Defaults to `flaketrack.yaml` or `flaketrack.yml` in
 *   the current working directory.
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const projectDir = path.dirname(resolvedPath);

  dotenv.config({ path: path.resolve(projectDir, '.env') });

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new HarnessError('CONFIG_NOT_FOUND', `Configuration file not found: ${resolvedPath}`, {
        path: resolvedPath,
      });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new HarnessError('CONFIG_INVALID', `YAML syntax error in ${resolvedPath}: ${toErrorMessage(err)}`, {
      path: resolvedPath,
    });
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object') {
    throw new HarnessError('CONFIG_INVALID', `Configuration file is empty or not a valid object: ${resolvedPath}`, {
      path: resolvedPath,
    });
  }

  return { config: parseConfig(parsed), configPath: resolvedPath, projectDir };
}

/**
 * Resolve the configuration file path.
 * If no explicit path is given, looks for `flaketrack.yaml` then
 * `flaketrack.yml` in `cwd`.
 */
export async function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): Promise<string> {
  if (configPath) {
    return path.resolve(cwd, configPath);
  }

  const candidates = CONFIG_FILE_NAMES.map((name) => path.resolve(cwd, name));
  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }

  throw new HarnessError(
    'CONFIG_NOT_FOUND',
    `Configuration file not found. Looked for:\n${candidates.map((c) => `  - ${c}`).join('\n')}`,
    { candidates },
  );
}

// =====================================================================
// Runtime Builders
// =====================================================================

const PRESET_POLICIES: Record<NonNullable<RetryPolicyConfig['preset']>, RetryPolicy> = {
  default: DEFAULT_RETRY_POLICY,
  network: NETWORK_RETRY_POLICY,
  api: API_RETRY_POLICY,
  ui: UI_RETRY_POLICY,
  none: NO_RETRY_POLICY,
};

function toPredicate(retryOn: NonNullable<RetryPolicyConfig['retryOn']>): RetryPredicate {
  if (Array.isArray(retryOn)) return matchFailures(retryOn);
  switch (retryOn) {
    case 'transient':
      return isTransientFailure;
    case 'all':
      return retryAll;
    case 'none':
      return retryNone;
  }
}

/** Build one immutable policy; out-of-range numbers are clamped with a warning. */
export function buildRetryPolicy(section: RetryPolicyConfig, logger: Logger = silentLogger): RetryPolicy {
  const base = PRESET_POLICIES[section.preset ?? 'default'];
  return normalizeRetryPolicy({
    maxAttempts: section.maxAttempts ?? base.maxAttempts,
    delayMs: section.delay !== undefined ? toMilliseconds(section.delay) : base.delayMs,
    exponentialBackoff: section.exponentialBackoff ?? base.exponentialBackoff,
    maxDelayMs: section.maxDelay !== undefined ? toMilliseconds(section.maxDelay) : base.maxDelayMs,
    isRetryable: section.retryOn !== undefined ? toPredicate(section.retryOn) : base.isRetryable,
  }, logger);
}

/** Build the policy lookup table from the `retry` section. */
export function buildPolicySet(retry: RetryConfig, logger: Logger = silentLogger): RetryPolicySet {
  const build = (section: RetryPolicyConfig) => buildRetryPolicy(section, logger);
  const mapValues = (record: Record<string, RetryPolicyConfig>): Record<string, RetryPolicy> =>
    Object.fromEntries(Object.entries(record).map(([key, section]) => [key, build(section)]));

  const kinds: Partial<Record<TestKind, RetryPolicy>> = {};
  for (const kind of TestKindSchema.options) {
    const section = retry.kinds[kind];
    if (section) kinds[kind] = build(section);
  }

  return {
    default: retry.default ? build(retry.default) : DEFAULT_RETRY_POLICY,
    kinds,
    tags: mapValues(Object.fromEntries(
      Object.entries(retry.tags).map(([tag, section]) => [tag.replace(/^@/, ''), section]),
    )),
    tests: mapValues(retry.tests),
  };
}

/** Build immutable units from the `units` section. */
export function buildUnits(units: readonly UnitConfig[]): TestUnit[] {
  return units.map((unit) => createTestUnit(unit));
}

/**
 * Build groups from the `groups` section, in list order. Without a
 * `groups` section the default smoke, api, ui and regression groups are
 * used.
 *
 * @throws {HarnessError} DUPLICATE_TEST_ID
 */
export function buildGroups(units: readonly TestUnit[], groups?: readonly GroupConfig[]): TestGroup[] {
  if (!groups) return createDefaultGroups(units);

  const builder = new TestGroupBuilder(units);
  for (const group of groups) {
    if ('kind' in group) {
      builder.addKind(group.kind, { id: group.id, strategy: group.strategy });
    } else if ('tag' in group) {
      builder.addTag(group.tag, { id: group.id, strategy: group.strategy });
    } else if ('tags' in group) {
      builder.addTags(group.tags, { id: group.id, strategy: group.strategy, match: group.match });
    } else if ('balanced' in group) {
      builder.addBalanced(group.balanced, { strategy: group.strategy });
    } else if (group.preset === 'smoke') {
      builder.addSmoke();
    } else if (group.preset === 'regression') {
      builder.addRegression();
    } else {
      builder.addSmoke().addKind('api').addKind('ui').addRegression();
    }
  }
  return builder.build();
}

/** The `history` section as a HistoryConfig, paths resolved against `projectDir`. */
export function toHistoryConfig(config: FlaketrackConfig, projectDir: string): HistoryConfig {
  const { enabled, storage, window, threshold } = config.history;
  return {
    enabled,
    storage,
    path: config.history.path !== undefined ? path.resolve(projectDir, config.history.path) : undefined,
    window,
    threshold,
  };
}

// =====================================================================
// Internal Helpers
// =====================================================================

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function exists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true, () => false);
}
