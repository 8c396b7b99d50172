/** Identifier assigned by the queue backend. Opaque to the worker. */
export type QueueItemId = string;

/**
 * A unit of work claimed from a named queue.
 *
 * `data` is whatever the producer enqueued. It is only trusted after
 * `parseQueuePayload()` has turned it into a `SignatureRecord`.
 */
export interface QueueItem {
  readonly id: QueueItemId;
  readonly data: unknown;
  /** Epoch ms when the producer created the item. */
  readonly created: number;
  /** Epoch ms when the current lease ends. `0` when the item is not claimed. */
  readonly expire: number;
}

/** Check whether a payload carries no usable value (`null`, `undefined`, or only empty fields). */
export function isEmptyPayload(data: unknown): boolean {
  if (data === null || data === undefined || data === '') return true;
  if (typeof data !== 'object' || Array.isArray(data)) return false;
  return Object.values(data).every((v) => v === undefined || v === null || v === '');
}
