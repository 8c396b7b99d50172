import type { QueueItem } from '@signature-relay/core';
import type { QueueItemRow } from '../models/QueueItemModel.js';
import { decodePayload } from '../utils/payloadCodec.js';

export function toDomain(row: QueueItemRow): QueueItem {
  return {
    id: String(row.item_id),
    data: decodePayload(row.data),
    created: Number(row.created),
    expire: Number(row.expire),
  };
}

/** Primary key of a domain item. Ids this adapter hands out are always numeric. */
export function toItemId(item: QueueItem): number {
  const id = Number(item.id);
  if (!Number.isSafeInteger(id)) {
    throw new Error(`Queue item id must be an integer, got "${item.id}"`);
  }
  return id;
}
