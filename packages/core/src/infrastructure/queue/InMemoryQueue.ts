import type { QueueItem, QueueItemId } from '../../domain/model/QueueItem.js';
import type { QueueProvider, SignatureQueue } from '../../domain/ports/SignatureQueue.js';

export interface InMemoryQueueOptions {
  /** Lease used when `claimItem()` is called without one. Default: `3600`. */
  readonly defaultLeaseSeconds?: number;
  /** Clock in epoch ms. Default: `Date.now`. */
  readonly now?: () => number;
}

/** Non-persistent queue. Items are claimed oldest first. */
export class InMemoryQueue implements SignatureQueue {
  private items = new Map<QueueItemId, QueueItem>();
  private nextId = 1;
  private readonly defaultLeaseSeconds: number;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    options: InMemoryQueueOptions = {},
  ) {
    this.defaultLeaseSeconds = options.defaultLeaseSeconds ?? 3600;
    this.now = options.now ?? Date.now;
  }

  createQueue(): Promise<void> {
    return Promise.resolve();
  }

  createItem(data: unknown): Promise<QueueItemId> {
    const id = String(this.nextId++);
    this.items.set(id, { id, data, created: this.now(), expire: 0 });
    return Promise.resolve(id);
  }

  numberOfItems(): Promise<number> {
    return Promise.resolve(this.items.size);
  }

  claimItem(leaseSeconds?: number): Promise<QueueItem | null> {
    for (const item of this.items.values()) {
      if (item.expire === 0) {
        const claimed = { ...item, expire: this.now() + (leaseSeconds ?? this.defaultLeaseSeconds) * 1000 };
        this.items.set(item.id, claimed);
        return Promise.resolve(claimed);
      }
    }
    return Promise.resolve(null);
  }

  releaseItem(item: QueueItem): Promise<void> {
    const current = this.items.get(item.id);
    if (current) {
      this.items.set(item.id, { ...current, expire: 0 });
    }
    return Promise.resolve();
  }

  deleteItem(item: QueueItem): Promise<void> {
    this.items.delete(item.id);
    return Promise.resolve();
  }

  releaseExpired(): Promise<number> {
    const now = this.now();
    let released = 0;
    for (const item of this.items.values()) {
      if (item.expire !== 0 && item.expire < now) {
        this.items.set(item.id, { ...item, expire: 0 });
        released++;
      }
    }
    return Promise.resolve(released);
  }

  /** Items currently held, in claim order. */
  snapshot(): readonly QueueItem[] {
    return [...this.items.values()];
  }
}

/** Hands out one `InMemoryQueue` per name, creating it on first use. */
export class InMemoryQueueProvider implements QueueProvider {
  private readonly queues = new Map<string, InMemoryQueue>();

  constructor(private readonly options: InMemoryQueueOptions = {}) {}

  get(name: string): InMemoryQueue {
    const existing = this.queues.get(name);
    if (existing) return existing;

    const queue = new InMemoryQueue(name, this.options);
    this.queues.set(name, queue);
    return queue;
  }
}
