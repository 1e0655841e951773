/**
 * @module logger
 * Leveled, scoped logging for harness components.
 *
 * Components receive a {@link Logger} through their options. The default
 * {@link ConsoleLogger} writes `[scope] message key=value` lines to the
 * console; {@link silentLogger} discards everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Derive a logger for a nested scope, e.g. `runner` → `runner:api` */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  scope?: string;
  /** Drop messages below this level. Default: 'info'. */
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class ConsoleLogger implements Logger {
  private readonly scope: string | undefined;
  private readonly level: LogLevel;

  constructor(options?: ConsoleLoggerOptions) {
    this.scope = options?.scope;
    this.level = options?.level ?? 'info';
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  child(scope: string): Logger {
    return new ConsoleLogger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      level: this.level,
    });
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = formatLogLine(this.scope, message, meta);
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

/** Render one log line: `[scope] message key=value ...` */
export function formatLogLine(scope: string | undefined, message: string, meta?: LogMeta): string {
  const prefix = scope ? `[${scope}] ` : '';
  const fields = meta
    ? Object.entries(meta)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${formatValue(value)}`)
    : [];
  return fields.length > 0 ? `${prefix}${message} ${fields.join(' ')}` : `${prefix}${message}`;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

const noop = (): void => {};

/** Logger that discards every message. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
