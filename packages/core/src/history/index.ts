/**
 * @module history
 * Execution history persistence & flakiness analysis subsystem.
 */

export * from './types.js';
export type { HistoryStore } from './history-store.js';
export {
  SQLiteHistoryStore,
  NoopHistoryStore,
  createHistoryStore,
  assertAppendOrder,
  DEFAULT_HISTORY_PATH,
} from './history-store.js';
export { MemoryHistoryStore } from './memory-history-store.js';
export { HistoryRecorder, toRecords } from './history-recorder.js';
export type { HistoryRecorderOptions, RecordRunResult } from './history-recorder.js';
export {
  FlakinessAnalyzer,
  scoreHistory,
  DEFAULT_FLAKY_WINDOW,
  DEFAULT_FLAKY_THRESHOLD,
} from './flakiness-analyzer.js';
export type { FlakinessAnalyzerOptions, AnalyzeAllOptions } from './flakiness-analyzer.js';
export { applyMigrations, SCHEMA_VERSION } from './migrations.js';
