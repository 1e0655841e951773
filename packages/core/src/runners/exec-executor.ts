/**
 * @module runners/exec-executor
 * Shell-command scenario executor.
 *
 * Implements {@link ScenarioExecutor} by running a command template per
 * test unit via `sh -c` and interpreting the exit code. One instance is
 * created per group, so every execution context spawns its own processes.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { ScenarioExecutor, ScenarioOutcome, TestUnit } from '../types.js';
import { isTransientFailure } from '../retry-engine.js';

export interface ExecExecutorOptions {
  /** Command template; `{id}`, `{kind}` and `{tags}` are replaced per unit */
  command: string;
  cwd?: string;
  env?: Record<string, string>;
  /** Per-invocation time limit in milliseconds */
  timeoutMs?: number;
}

/** Number of trailing output lines kept in a failure message. */
const OUTPUT_TAIL_LINES = 20;

/** Quote a value for safe interpolation into an `sh -c` command line. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Substitute the unit's placeholders into a command template. */
export function renderCommand(template: string, unit: TestUnit): string {
  const values: Record<string, string> = {
    id: unit.id,
    kind: unit.kind,
    tags: [...unit.tags].join(','),
  };
  return template.replace(/\{(id|kind|tags)\}/g, (placeholder: string, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : shellQuote(value);
  });
}

/** Extra environment for a unit; API units run without a browser. */
export function unitEnvironment(unit: TestUnit): Record<string, string> {
  const env: Record<string, string> = {
    TEST_ID: unit.id,
    TEST_KIND: unit.kind,
  };
  if (unit.kind === 'api') {
    env['API_ONLY'] = 'true';
    env['SKIP_BROWSER'] = 'true';
  }
  return env;
}

/** Last `lines` non-empty lines of `output`. */
export function outputTail(output: string, lines: number = OUTPUT_TAIL_LINES): string {
  return output
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim() !== '')
    .slice(-lines)
    .join('\n');
}

/**
 * Exec executor — runs the configured command once per invocation.
 *
 * Exit code 0 is a pass; any other exit is a failure whose message is the
 * tail of the combined output. Exceeding `timeoutMs` kills the process
 * and reports `timeout`. A spawn failure rejects, which the runner treats
 * as a crash of the group's context.
 */
export class ExecScenarioExecutor implements ScenarioExecutor {
  private readonly running = new Set<ChildProcess>();

  constructor(private readonly options: ExecExecutorOptions) {}

  execute(unit: TestUnit, signal: AbortSignal): Promise<ScenarioOutcome> {
    const command = renderCommand(this.options.command, unit);
    const startedAt = Date.now();

    return new Promise<ScenarioOutcome>((resolve, reject) => {
      signal.throwIfAborted();

      const proc = spawn('sh', ['-c', command], {
        cwd: this.options.cwd,
        env: { ...process.env, ...this.options.env, ...unitEnvironment(unit) },
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      this.running.add(proc);

      let output = '';
      let timedOut = false;

      const timer = this.options.timeoutMs !== undefined
        ? setTimeout(() => {
          timedOut = true;
          proc.kill('SIGTERM');
        }, this.options.timeoutMs)
        : undefined;

      const onAbort = (): void => {
        proc.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        this.running.delete(proc);
      };

      proc.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        output += data.toString();
      });

      proc.on('close', (code) => {
        cleanup();
        const duration = Date.now() - startedAt;

        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        if (timedOut) {
          resolve({
            status: 'timeout',
            duration,
            failure: { message: `Command timed out after ${this.options.timeoutMs}ms`, kind: 'TimeoutError' },
          });
          return;
        }
        if (code === 0) {
          resolve({ status: 'passed', duration });
          return;
        }

        const message = outputTail(output) || `Command exited with code ${code}`;
        const transient = isTransientFailure({ status: 'failed', message });
        resolve({
          status: 'failed',
          duration,
          failure: transient ? { message, kind: 'TransientError' } : { message },
        });
      });

      proc.on('error', (err) => {
        cleanup();
        reject(new Error(`Failed to spawn command: ${err.message}`));
      });
    });
  }

  /** Kill any process still running for this context. */
  async dispose(): Promise<void> {
    for (const proc of this.running) {
      proc.kill('SIGKILL');
    }
    this.running.clear();
  }
}

/** Executor factory that gives each group its own ExecScenarioExecutor. */
export function createExecExecutorFactory(options: ExecExecutorOptions): () => ExecScenarioExecutor {
  return () => new ExecScenarioExecutor(options);
}
