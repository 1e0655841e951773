/**
 * @module errors
 * Structured error types, error code registry, and factory for the harness.
 *
 * Codes are machine-readable so callers (CLI, reporters) can decide how to
 * react without parsing free-text messages.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known harness error codes. */
export type HarnessErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'DUPLICATE_TEST_ID'
  | 'CONTEXT_CRASH'
  | 'GROUP_TIMEOUT'
  | 'RUN_CANCELLED'
  | 'NON_MONOTONIC_HISTORY'
  | 'HISTORY_UNAVAILABLE';

/** Broad classification of error origin. */
export type ErrorCategory = 'configuration' | 'infrastructure' | 'execution' | 'history';

/** Machine-readable error payload. */
export interface StructuredError {
  code: HarnessErrorCode;
  category: ErrorCategory;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  suggestedActions: string[];
}

/** Classification and recovery hints for every error code. */
export const ERROR_METADATA: ReadonlyMap<HarnessErrorCode, ErrorMetadataEntry> = new Map<HarnessErrorCode, ErrorMetadataEntry>([
  ['CONFIG_NOT_FOUND', {
    category: 'configuration',
    suggestedActions: ['Pass --config <path>', 'Create flaketrack.yaml in the working directory'],
  }],
  ['CONFIG_INVALID', {
    category: 'configuration',
    suggestedActions: ['Fix the reported fields', 'Check YAML indentation'],
  }],
  ['DUPLICATE_TEST_ID', {
    category: 'configuration',
    suggestedActions: ['Give every test unit a unique identifier'],
  }],
  ['CONTEXT_CRASH', {
    category: 'infrastructure',
    suggestedActions: ['Inspect the executor logs for the group', 'Check environment setup for the group'],
  }],
  ['GROUP_TIMEOUT', {
    category: 'execution',
    suggestedActions: ['Increase runner.groupTimeout', 'Split the group into smaller groups'],
  }],
  ['RUN_CANCELLED', {
    category: 'execution',
    suggestedActions: ['Re-run the affected groups'],
  }],
  ['NON_MONOTONIC_HISTORY', {
    category: 'history',
    suggestedActions: ['Check the system clock', 'Do not append records older than the stored history'],
  }],
  ['HISTORY_UNAVAILABLE', {
    category: 'history',
    suggestedActions: ['Check the history.path setting', 'Use history.storage: memory'],
  }],
]);

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code, resolving its
 * category and suggested actions from the registry.
 */
export function createStructuredError(
  code: HarnessErrorCode,
  message: string,
  details: Record<string, unknown> = {},
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'execution',
    message,
    details,
    suggestedActions: metadata ? [...metadata.suggestedActions] : [],
    timestamp: Date.now(),
  };
}

// =====================================================================
// HarnessError Class
// =====================================================================

/**
 * Error subclass wrapping a StructuredError for throw/catch patterns.
 */
export class HarnessError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: HarnessErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'HarnessError';
    this.structuredError = createStructuredError(code, message, details);
  }

  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): HarnessErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }
}

/** Type guard for a HarnessError, optionally of a specific code. */
export function isHarnessError(err: unknown, code?: HarnessErrorCode): err is HarnessError {
  return err instanceof HarnessError && (code === undefined || err.code === code);
}

/** Message of an unknown thrown value. */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
