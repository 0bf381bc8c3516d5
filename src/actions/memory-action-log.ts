/**
 * @file In-memory implementation of IActionLogSink.
 * Useful for testing, development, or hosts without a reinforcement-learning store.
 * Records are lost when the process exits.
 */

import { ActionLogRecord, IActionLogSink } from './types';

export class MemoryActionLog implements IActionLogSink {
  private records: ActionLogRecord[] = [];

  constructor() {
    console.warn('[MemoryActionLog] Initialized. Records are kept in memory only.');
  }

  logAction(record: ActionLogRecord): void {
    this.records.push({ ...record, metadata: { ...record.metadata } });
  }

  /** Returns copies of the stored records, optionally only those of one task. */
  getRecords(taskId?: string): ActionLogRecord[] {
    const selected = taskId ? this.records.filter((r) => r.taskId === taskId) : this.records;
    return selected.map((r) => ({ ...r, metadata: { ...r.metadata } }));
  }

  clear(): void {
    this.records = [];
  }
}
