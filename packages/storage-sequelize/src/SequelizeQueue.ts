import { Op } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { QueueItem, QueueItemId, QueueProvider, SignatureQueue } from '@signature-relay/core';
import { defineQueueItemModel } from './models/QueueItemModel.js';
import type { QueueItemModel } from './models/QueueItemModel.js';
import * as QueueItemMapper from './mappers/QueueItemMapper.js';
import { encodePayload } from './utils/payloadCodec.js';

export interface SequelizeQueueOptions {
  /** Table holding the items of every queue. Default: `'queue'`. */
  readonly tableName?: string;
  /** Lease used when `claimItem()` is called without one. Default: `3600`. */
  readonly defaultLeaseSeconds?: number;
  /** Clock in epoch ms. Default: `Date.now`. */
  readonly now?: () => number;
}

/**
 * Reliable queue stored in a single Sequelize table shared by all queue names.
 *
 * Claims are optimistic: the oldest unclaimed row is read, then leased with an
 * `UPDATE ... WHERE expire = 0`. When another worker wins the race the update
 * touches no row and the next candidate is tried, so two workers never hold
 * the same item.
 */
export class SequelizeQueue implements SignatureQueue {
  private readonly defaultLeaseSeconds: number;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    private readonly Item: QueueItemModel,
    options: SequelizeQueueOptions = {},
  ) {
    this.defaultLeaseSeconds = options.defaultLeaseSeconds ?? 3600;
    this.now = options.now ?? Date.now;
  }

  async createQueue(): Promise<void> {
    await this.Item.sync();
  }

  async createItem(data: unknown): Promise<QueueItemId> {
    const row = await this.Item.create({
      name: this.name,
      data: encodePayload(data),
      expire: 0,
      created: this.now(),
    });
    return String(row.get('item_id'));
  }

  async numberOfItems(): Promise<number> {
    return this.Item.count({ where: { name: this.name } });
  }

  async claimItem(leaseSeconds?: number): Promise<QueueItem | null> {
    const lease = (leaseSeconds ?? this.defaultLeaseSeconds) * 1000;

    for (;;) {
      const candidate = await this.Item.findOne({
        where: { name: this.name, expire: 0 },
        order: [
          ['created', 'ASC'],
          ['item_id', 'ASC'],
        ],
      });
      if (!candidate) return null;

      const item = QueueItemMapper.toDomain(candidate.get({ plain: true }));
      const expire = this.now() + lease;
      const [affected] = await this.Item.update(
        { expire },
        { where: { item_id: QueueItemMapper.toItemId(item), expire: 0 } },
      );

      if (affected === 1) {
        return { ...item, expire };
      }
      // Another worker leased it between the read and the update.
    }
  }

  async releaseItem(item: QueueItem): Promise<void> {
    await this.Item.update({ expire: 0 }, { where: { item_id: QueueItemMapper.toItemId(item) } });
  }

  async deleteItem(item: QueueItem): Promise<void> {
    await this.Item.destroy({ where: { item_id: QueueItemMapper.toItemId(item) } });
  }

  async releaseExpired(): Promise<number> {
    const [affected] = await this.Item.update(
      { expire: 0 },
      { where: { name: this.name, expire: { [Op.ne]: 0, [Op.lt]: this.now() } } },
    );
    return affected;
  }
}

/**
 * Hands out `SequelizeQueue` instances backed by one shared table.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeQueueProvider implements QueueProvider {
  private readonly Item: QueueItemModel;
  private readonly queues = new Map<string, SequelizeQueue>();

  constructor(
    sequelize: Sequelize,
    private readonly options: SequelizeQueueOptions = {},
  ) {
    this.Item = defineQueueItemModel(sequelize, options.tableName);
  }

  async initialize(): Promise<void> {
    await this.Item.sync();
  }

  get(name: string): SequelizeQueue {
    const existing = this.queues.get(name);
    if (existing) return existing;

    const queue = new SequelizeQueue(name, this.Item, this.options);
    this.queues.set(name, queue);
    return queue;
  }
}
