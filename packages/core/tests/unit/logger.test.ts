/**
 * Unit tests for the logger and structured errors.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, formatLogLine, isLogLevel } from '../../src/logger.js';
import { HarnessError, createStructuredError, isHarnessError, toErrorMessage } from '../../src/errors.js';

describe('formatLogLine', () => {
  it('renders scope, message and fields', () => {
    expect(formatLogLine('runner:api', 'group finished', { state: 'completed', passed: 3 })).toBe(
      '[runner:api] group finished state=completed passed=3',
    );
  });

  it('quotes strings with whitespace and serializes objects', () => {
    expect(formatLogLine(undefined, 'failed', { error: 'socket hang up', ids: ['a', 'b'], skipped: undefined })).toBe(
      'failed error="socket hang up" ids=["a","b"]',
    );
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'warn' });

    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('shown');
  });

  it('nests child scopes', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger({ scope: 'runner' }).child('ui').error('crashed', { code: 1 });

    expect(error).toHaveBeenCalledWith('[runner:ui] crashed code=1');
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('HarnessError', () => {
  it('carries code, category and suggested actions', () => {
    const err = new HarnessError('GROUP_TIMEOUT', 'Group "ui" timed out', { groupId: 'ui' });

    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('GROUP_TIMEOUT');
    expect(err.category).toBe('execution');
    expect(err.toJSON().details).toEqual({ groupId: 'ui' });
    expect(err.toJSON().suggestedActions).toEqual(['Increase runner.groupTimeout', 'Split the group into smaller groups']);
  });

  it('is recognised by code', () => {
    const err = new HarnessError('NON_MONOTONIC_HISTORY', 'out of order');

    expect(isHarnessError(err)).toBe(true);
    expect(isHarnessError(err, 'NON_MONOTONIC_HISTORY')).toBe(true);
    expect(isHarnessError(err, 'CONFIG_INVALID')).toBe(false);
    expect(isHarnessError(new Error('plain'))).toBe(false);
  });
});

describe('createStructuredError', () => {
  it('resolves the category from the registry', () => {
    expect(createStructuredError('HISTORY_UNAVAILABLE', 'db locked').category).toBe('history');
  });
});

describe('toErrorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage(42)).toBe('42');
  });
});
