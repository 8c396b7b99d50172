import type { TargetTable } from './Tables.js';

/**
 * Counters for one pass over a queue.
 *
 * `retrieved` counts claimed items, so
 * `retrieved === saved + skipped + failed + malformed` always holds.
 */
export interface BatchResult {
  /** Items claimed from the queue. */
  readonly retrieved: number;
  /** Rows inserted into the destination table. */
  readonly saved: number;
  /** Items already recorded in the processed ledger. Deleted without writing. */
  readonly skipped: number;
  /** Items whose lookup, insert or delete threw. Left in the queue for the next run. */
  readonly failed: number;
  /** Items with an empty or unrecognized payload. Deleted without writing. */
  readonly malformed: number;
  /** Queue depth before the batch started. Informational only. */
  readonly queued: number;
}

/** Outcome of the worker for one queue/table pair. */
export interface TransferResult {
  readonly queueName: string;
  readonly table: TargetTable;
  readonly result: BatchResult;
}

/** Everything a workflow run did, pair by pair. */
export interface WorkflowSummary {
  readonly jobId: string;
  readonly results: readonly TransferResult[];
}

export function emptyBatchResult(queued = 0): BatchResult {
  return { retrieved: 0, saved: 0, skipped: 0, failed: 0, malformed: 0, queued };
}

/** `true` when every claimed item reached a final state (saved, skipped or malformed). */
export function isCleanBatch(result: BatchResult): boolean {
  return result.failed === 0;
}

/** `true` when no pair of the run left an item behind for retry. */
export function isCleanRun(summary: WorkflowSummary): boolean {
  return summary.results.every((r) => isCleanBatch(r.result));
}
