// flaketrack-core - grouping, parallel execution, retries and flakiness history

// Types
export * from './types.js';

// Logging
export { ConsoleLogger, silentLogger, formatLogLine, isLogLevel } from './logger.js';
export type { Logger, LogLevel, LogMeta, ConsoleLoggerOptions } from './logger.js';

// Errors
export {
  HarnessError,
  ERROR_METADATA,
  createStructuredError,
  isHarnessError,
  toErrorMessage,
} from './errors.js';
export type { HarnessErrorCode, ErrorCategory, StructuredError } from './errors.js';

// Config Loader
export {
  loadConfig,
  parseConfig,
  resolveConfigPath,
  buildRetryPolicy,
  buildPolicySet,
  buildUnits,
  buildGroups,
  toHistoryConfig,
  CONFIG_FILE_NAMES,
  FlaketrackConfigSchema,
  RetryPolicySchema,
  RetryConfigSchema,
  GroupSchema,
  UnitSchema,
  HistorySchema,
  ExecutorSchema,
  DurationSchema,
} from './config-loader.js';
export type {
  FlaketrackConfig,
  LoadedConfig,
  RetryPolicyConfig,
  RetryConfig,
  GroupConfig,
  UnitConfig,
} from './config-loader.js';

// Group Builder
export {
  TestGroupBuilder,
  createTestUnit,
  createDefaultGroups,
  normalizeTag,
} from './group-builder.js';
export type { TestUnitInput, GroupOptions, TagMatch } from './group-builder.js';

// Retry Engine
export {
  RetryHandler,
  withRetry,
  normalizeRetryPolicy,
  resolveRetryPolicy,
  computeBackoffDelay,
  isTransientFailure,
  matchFailures,
  retryAll,
  retryNone,
  parseDelay,
  toMilliseconds,
  summarizeRetries,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_RETRY_POLICY,
  NETWORK_RETRY_POLICY,
  API_RETRY_POLICY,
  UI_RETRY_POLICY,
  NO_RETRY_POLICY,
} from './retry-engine.js';
export type {
  RetryTarget,
  RetryEvent,
  RetryExecuteOptions,
  RetryHandlerOptions,
  RetryStatistics,
} from './retry-engine.js';

// Parallel Engine
export {
  ParallelTestRunner,
  Semaphore,
  fromCallback,
  DEFAULT_GROUP_TIMEOUT_MS,
} from './parallel-engine.js';
export type {
  ParallelRunnerOptions,
  RunOptions,
  RunOutcome,
  RunnerEvent,
  GroupSummary,
  GroupState,
} from './parallel-engine.js';
export { GroupContext } from './group-context.js';
export type { ContextMessage, ContextExit, Interruption, TerminationReason } from './group-context.js';

// Exec Executor
export {
  ExecScenarioExecutor,
  createExecExecutorFactory,
  renderCommand,
  shellQuote,
  unitEnvironment,
  outputTail,
} from './runners/exec-executor.js';
export type { ExecExecutorOptions } from './runners/exec-executor.js';

// History
export * from './history/index.js';

// Harness
export { TestHarness } from './harness.js';
export type { TestHarnessOptions, HarnessRunResult } from './harness.js';
