/**
 * @module commands/shared
 * Option parsing and error reporting shared by the commands.
 */

import { InvalidArgumentError } from 'commander';
import { isHarnessError, toErrorMessage } from 'flaketrack-core';
import type { CliIO } from '../output.js';
import { paint } from '../output.js';

const RED = '\x1b[31m';
const GRAY = '\x1b[90m';

/** Options every command receives from the program. */
export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

/** Commander argument parser for integers ≥ 1. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Commander argument parser for ratios in [0, 1]. */
export function parseRatio(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

/** Print an error, with the code and suggested actions of a HarnessError. */
export function reportError(io: CliIO, err: unknown): void {
  if (isHarnessError(err)) {
    io.err(paint(io, `Error [${err.code}]: ${err.message}`, RED));
    for (const action of err.structuredError.suggestedActions) {
      io.err(paint(io, `  → ${action}`, GRAY));
    }
    return;
  }
  io.err(paint(io, `Error: ${toErrorMessage(err)}`, RED));
}
