import type { QueueItem, QueueItemId } from '../model/QueueItem.js';

/**
 * Port for a named queue with lease-based claims.
 *
 * A claimed item stays invisible to other claimants until it is deleted,
 * released, or its lease expires and `releaseExpired()` returns it.
 */
export interface SignatureQueue {
  readonly name: string;
  /** Prepare backing storage. Safe to call more than once. */
  createQueue(): Promise<void>;
  /** Enqueue a payload. Used by producers. */
  createItem(data: unknown): Promise<QueueItemId>;
  /** Number of items in the queue, claimed or not. */
  numberOfItems(): Promise<number>;
  /** Lease the oldest unclaimed item, or return `null` when none is available. */
  claimItem(leaseSeconds?: number): Promise<QueueItem | null>;
  /** End the lease so the item can be claimed again. */
  releaseItem(item: QueueItem): Promise<void>;
  /** Remove the item permanently. */
  deleteItem(item: QueueItem): Promise<void>;
  /** Return items whose lease has expired. Resolves to the number of items released. */
  releaseExpired(): Promise<number>;
}

/** Resolves a queue by its full name. */
export interface QueueProvider {
  get(name: string): SignatureQueue;
}
