import type { BatchResult } from '../../domain/model/BatchResult.js';
import type { QueueItem } from '../../domain/model/QueueItem.js';
import type { RunContext } from '../../domain/model/RunContext.js';
import { correlationSuffix } from '../../domain/model/RunContext.js';
import type { SignatureRecord } from '../../domain/model/SignatureRecord.js';
import { parseQueuePayload, readValidationKey } from '../../domain/model/SignatureRecord.js';
import type { TargetTable } from '../../domain/model/Tables.js';
import type { QueueProvider, SignatureQueue } from '../../domain/ports/SignatureQueue.js';
import type { RecordStore } from '../../domain/ports/RecordStore.js';
import type { WorkflowLogger } from '../../domain/ports/WorkflowLogger.js';
import type { ProcessedValidationLedger } from '../../domain/services/ProcessedValidationLedger.js';
import type { EventBus } from '../EventBus.js';

/** Collaborators shared by every batch of a workflow. */
export interface TransferDependencies {
  readonly queues: QueueProvider;
  readonly store: RecordStore;
  readonly ledger: ProcessedValidationLedger;
  readonly logger: WorkflowLogger;
  readonly eventBus: EventBus;
  /** Lease requested for each claim. `undefined` leaves it to the queue. */
  readonly leaseSeconds?: number;
}

type Outcome = 'saved' | 'skipped' | 'failed' | 'malformed';

interface Counters {
  retrieved: number;
  saved: number;
  skipped: number;
  failed: number;
  malformed: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Use case: drain up to `maxBatchSize` items from one queue into one table.
 *
 * Saved, duplicate and malformed items are deleted from the queue. Items whose
 * storage calls fail are released at the end of the batch so the next run
 * claims them again. Never rejects: every error ends up in the counters and
 * the log.
 */
export class TransferBatch {
  constructor(private readonly deps: TransferDependencies) {}

  async execute(queueName: string, table: TargetTable, maxBatchSize: number, run: RunContext): Promise<BatchResult> {
    const { logger, eventBus } = this.deps;
    const suffix = correlationSuffix(run);
    const queue = this.deps.queues.get(queueName);
    const counters: Counters = { retrieved: 0, saved: 0, skipped: 0, failed: 0, malformed: 0 };
    const retained: QueueItem[] = [];
    let queued = 0;

    try {
      await queue.createQueue();
      const expired = await queue.releaseExpired();
      if (expired > 0) {
        logger.notice(
          { jobId: run.jobId, queueName, released: expired },
          `Released ${String(expired)} expired lease(s) on ${queueName}. ${suffix}`,
        );
      }
      queued = await queue.numberOfItems();
    } catch (error) {
      logger.error(
        { jobId: run.jobId, queueName, table, error: errorMessage(error) },
        `Could not open queue ${queueName}: ${errorMessage(error)}. ${suffix}`,
      );
      return this.finish(queueName, table, counters, queued, run);
    }

    eventBus.emit({
      type: 'batch:started',
      jobId: run.jobId,
      queueName,
      table,
      queued,
      maxBatchSize,
      timestamp: Date.now(),
    });

    for (let i = 0; i < maxBatchSize; i++) {
      let item: QueueItem | null;
      try {
        item = await queue.claimItem(this.deps.leaseSeconds);
      } catch (error) {
        logger.error(
          { jobId: run.jobId, queueName, table, error: errorMessage(error) },
          `Claiming from ${queueName} failed, ending batch early: ${errorMessage(error)}. ${suffix}`,
        );
        break;
      }

      if (item === null) break;

      counters.retrieved++;
      const outcome = await this.transferItem(queue, item, table, run);
      counters[outcome]++;
      if (outcome === 'failed') retained.push(item);
    }

    await this.releaseRetained(queue, retained, run);

    return this.finish(queueName, table, counters, queued, run);
  }

  private async transferItem(
    queue: SignatureQueue,
    item: QueueItem,
    table: TargetTable,
    run: RunContext,
  ): Promise<Outcome> {
    const { logger, eventBus } = this.deps;
    const suffix = correlationSuffix(run);
    const base = { jobId: run.jobId, queueName: queue.name, table, itemId: item.id };

    // The ledger only needs the key, so duplicates are recognized even when
    // the rest of the payload would not make a valid row.
    const secretValidationKey = table === 'validations' ? readValidationKey(item.data) : null;
    if (secretValidationKey !== null) {
      try {
        if (await this.deps.ledger.isProcessed(secretValidationKey)) {
          await queue.deleteItem(item);
          logger.notice(
            { ...base, secretValidationKey },
            `Skipped validation ${secretValidationKey}: already processed. ${suffix}`,
          );
          eventBus.emit({ type: 'item:skipped', ...base, secretValidationKey, timestamp: Date.now() });
          return 'skipped';
        }
      } catch (error) {
        return this.fail(base, error, run);
      }
    }

    const parsed = parseQueuePayload(table, item.data);
    if (!parsed.ok) {
      logger.error(
        { ...base, reason: parsed.reason, error: parsed.error },
        `Dropped malformed item ${item.id} from ${queue.name}: ${parsed.error}. ${suffix}`,
      );
      try {
        await queue.deleteItem(item);
      } catch (error) {
        // Still malformed: a later run will drop it again.
        logger.error(
          { ...base, error: errorMessage(error) },
          `Could not delete malformed item ${item.id} from ${queue.name}: ${errorMessage(error)}. ${suffix}`,
        );
      }
      eventBus.emit({
        type: 'item:malformed',
        ...base,
        reason: parsed.reason,
        error: parsed.error,
        timestamp: Date.now(),
      });
      return 'malformed';
    }

    try {
      const rowId = await this.insert(parsed.record);
      await queue.deleteItem(item);
      eventBus.emit({ type: 'item:saved', ...base, rowId, timestamp: Date.now() });
      return 'saved';
    } catch (error) {
      return this.fail(base, error, run);
    }
  }

  private fail(
    base: { jobId: string; queueName: string; table: TargetTable; itemId: string },
    error: unknown,
    run: RunContext,
  ): 'failed' {
    this.deps.logger.error(
      { ...base, error: errorMessage(error) },
      `Failed to move item ${base.itemId} from ${base.queueName} to ${base.table}, keeping it for retry: ` +
        `${errorMessage(error)}. ${correlationSuffix(run)}`,
    );
    this.deps.eventBus.emit({ type: 'item:failed', ...base, error: errorMessage(error), timestamp: Date.now() });
    return 'failed';
  }

  private async insert(record: SignatureRecord): Promise<number> {
    switch (record.kind) {
      case 'pending_signature':
        return this.deps.store.insert('signatures_pending_validation', record.row);
      case 'validation':
        return this.deps.store.insert('validations', record.row);
    }
  }

  private async releaseRetained(queue: SignatureQueue, items: readonly QueueItem[], run: RunContext): Promise<void> {
    for (const item of items) {
      try {
        await queue.releaseItem(item);
      } catch (error) {
        // The lease expires on its own; releaseExpired() picks the item up then.
        this.deps.logger.error(
          { jobId: run.jobId, queueName: queue.name, itemId: item.id, error: errorMessage(error) },
          `Could not release item ${item.id} on ${queue.name}: ${errorMessage(error)}. ${correlationSuffix(run)}`,
        );
      }
    }
  }

  private finish(
    queueName: string,
    table: TargetTable,
    counters: Counters,
    queued: number,
    run: RunContext,
  ): BatchResult {
    const result: BatchResult = { ...counters, queued };
    const fields = { jobId: run.jobId, queueName, table, ...result };
    const message =
      `${String(result.saved)} of ${String(result.retrieved)} item(s) moved from ${queueName} to ${table}; ` +
      `${String(result.skipped)} duplicate(s) skipped, ${String(result.failed)} failed, ` +
      `${String(result.malformed)} malformed. ${String(result.queued)} item(s) were queued. ${correlationSuffix(run)}`;

    if (result.failed > 0) {
      this.deps.logger.error(fields, message);
    } else {
      this.deps.logger.info(fields, message);
    }

    this.deps.eventBus.emit({
      type: 'batch:completed',
      jobId: run.jobId,
      queueName,
      table,
      result,
      timestamp: Date.now(),
    });

    return result;
  }
}
