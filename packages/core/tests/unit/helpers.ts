/**
 * Shared fixtures for core unit tests.
 */

import type { LogLevel, LogMeta, Logger } from '../../src/logger.js';
import type { ExecutionResult, ScenarioOutcome, TestKind, TestUnit } from '../../src/types.js';
import { createTestUnit } from '../../src/group-builder.js';

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  meta?: LogMeta;
}

/** Logger that keeps every entry, shared across child scopes. */
export class RecordingLogger implements Logger {
  constructor(
    readonly scope: string = 'test',
    readonly entries: LogEntry[] = [],
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'debug', scope: this.scope, message, meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'info', scope: this.scope, message, meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'warn', scope: this.scope, message, meta });
  }

  error(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'error', scope: this.scope, message, meta });
  }

  child(scope: string): Logger {
    return new RecordingLogger(`${this.scope}:${scope}`, this.entries);
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

export function unit(id: string, kind: TestKind = 'other', tags: string[] = []): TestUnit {
  return createTestUnit({ id, kind, tags });
}

export function passed(duration = 10): ScenarioOutcome {
  return { status: 'passed', duration };
}

export function failed(message: string, duration = 10, kind?: string): ScenarioOutcome {
  return { status: 'failed', duration, failure: kind ? { message, kind } : { message } };
}

export function result(
  testId: string,
  status: ExecutionResult['status'],
  overrides: Partial<ExecutionResult> = {},
): ExecutionResult {
  return {
    testId,
    groupId: 'g1',
    status,
    duration: 100,
    attemptsUsed: 1,
    attempts: [],
    timestamp: 1_000,
    ...overrides,
  };
}

/** Resolve after the current macrotask queue drains. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
