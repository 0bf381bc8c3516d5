// src/actions/types.ts

/**
 * @file The action-log sink agents report to, one record per processed query.
 */

export interface ActionLogRecord {
  /** Correlation id of the query. */
  taskId: string;
  agent: string;
  /** Which backend produced the response text, e.g. 'groq' or 'fallback'. */
  backend: string;
  action: string;
  metadata: Record<string, unknown>;
  /** ISO-8601 time the record was produced. */
  timestamp: string;
}

/**
 * Receives action records. Fire-and-forget: agents do not wait for an acknowledgement
 * beyond the returned promise, and a failing sink never fails a query.
 */
export interface IActionLogSink {
  logAction(record: ActionLogRecord): void | Promise<void>;
}
