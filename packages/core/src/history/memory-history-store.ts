/**
 * @module history/memory-history-store
 * In-memory Map-based implementation of HistoryStore for tests and CI mode.
 */

import type { HistoricalRecord, HistoryQuery } from './types.js';
import type { HistoryStore } from './history-store.js';
import { assertAppendOrder } from './history-store.js';

export class MemoryHistoryStore implements HistoryStore {
  private records = new Map<string, HistoricalRecord[]>();

  append(records: readonly HistoricalRecord[]): void {
    assertAppendOrder(records, (testId) => this.records.get(testId)?.at(-1)?.timestamp);

    for (const record of records) {
      const series = this.records.get(record.testId) ?? [];
      series.push({ ...record });
      this.records.set(record.testId, series);
    }
  }

  query(testId: string, options?: HistoryQuery): HistoricalRecord[] {
    let filtered = this.records.get(testId) ?? [];

    if (options?.from !== undefined) {
      const from = options.from;
      filtered = filtered.filter(r => r.timestamp >= from);
    }
    if (options?.to !== undefined) {
      const to = options.to;
      filtered = filtered.filter(r => r.timestamp <= to);
    }
    if (options?.limit !== undefined) {
      const limit = Math.max(0, Math.floor(options.limit));
      filtered = limit === 0 ? [] : filtered.slice(-limit);
    }

    return filtered.map(r => ({ ...r }));
  }

  testIds(): string[] {
    return [...this.records.keys()].sort();
  }

  close(): void {
    this.records.clear();
  }
}
