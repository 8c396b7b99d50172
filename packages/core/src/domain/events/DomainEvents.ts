import type { BatchResult, TransferResult } from '../model/BatchResult.js';
import type { QueueItemId } from '../model/QueueItem.js';
import type { MalformedReason } from '../model/SignatureRecord.js';
import type { TargetTable } from '../model/Tables.js';

/** Emitted when `run()` starts, before the first queue is touched. */
export interface WorkflowStartedEvent {
  readonly type: 'workflow:started';
  readonly jobId: string;
  readonly serverName?: string;
  readonly workerName?: string;
  /** Options passed by the caller, as given. */
  readonly options: Readonly<Record<string, unknown>>;
  readonly timestamp: number;
}

/** Emitted after every queue/table pair has been processed. */
export interface WorkflowCompletedEvent {
  readonly type: 'workflow:completed';
  readonly jobId: string;
  readonly results: readonly TransferResult[];
  readonly timestamp: number;
}

/** Emitted once the queue depth is known, before the first claim. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly queued: number;
  readonly maxBatchSize: number;
  readonly timestamp: number;
}

/** Emitted when a batch ends, whatever its outcome. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly result: BatchResult;
  readonly timestamp: number;
}

/** Emitted for each row inserted into the destination table. */
export interface ItemSavedEvent {
  readonly type: 'item:saved';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly itemId: QueueItemId;
  readonly rowId: number;
  readonly timestamp: number;
}

/** Emitted for each validation found in the processed ledger. */
export interface ItemSkippedEvent {
  readonly type: 'item:skipped';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly itemId: QueueItemId;
  readonly secretValidationKey: string;
  readonly timestamp: number;
}

/** Emitted for each item left in the queue after a storage error. */
export interface ItemFailedEvent {
  readonly type: 'item:failed';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly itemId: QueueItemId;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each item dropped because its payload is empty or unrecognized. */
export interface ItemMalformedEvent {
  readonly type: 'item:malformed';
  readonly jobId: string;
  readonly queueName: string;
  readonly table: TargetTable;
  readonly itemId: QueueItemId;
  readonly reason: MalformedReason;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | WorkflowStartedEvent
  | WorkflowCompletedEvent
  | BatchStartedEvent
  | BatchCompletedEvent
  | ItemSavedEvent
  | ItemSkippedEvent
  | ItemFailedEvent
  | ItemMalformedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
