import type { BatchResult, TransferResult, WorkflowSummary } from './domain/model/BatchResult.js';
import type { RunContext } from './domain/model/RunContext.js';
import { correlationSuffix } from './domain/model/RunContext.js';
import type { TargetTable, TransferPair } from './domain/model/Tables.js';
import { PREPROCESS_TRANSFERS } from './domain/model/Tables.js';
import type { QueueProvider } from './domain/ports/SignatureQueue.js';
import type { RecordStore } from './domain/ports/RecordStore.js';
import type { WorkflowLogger } from './domain/ports/WorkflowLogger.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ProcessedValidationLedger } from './domain/services/ProcessedValidationLedger.js';
import { EventBus } from './application/EventBus.js';
import { TransferBatch } from './application/usecases/TransferBatch.js';

/** Caller-supplied options for one run. Recorded with the run; no option changes processing yet. */
export type WorkflowOptions = Readonly<Record<string, unknown>>;

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
}

/** Configuration for the preprocess-signatures workflow. */
export interface PreprocessSignaturesConfig {
  readonly queues: QueueProvider;
  readonly store: RecordStore;
  readonly logger: WorkflowLogger;
  /** Maximum number of items claimed per queue per run. */
  readonly batchSize: number;
  /** Prepended to every queue base name. Default: `''`. */
  readonly queuePrefix?: string;
  /** Lease requested for each claim. Default: the queue's own default. */
  readonly leaseSeconds?: number;
  /** Queue/table pairs to drain, in order. Default: `PREPROCESS_TRANSFERS`. */
  readonly transfers?: readonly TransferPair[];
}

/**
 * Facade for the scheduled "preprocess signatures" workflow.
 *
 * Each run drains the pending-signatures queue, then the validations queue,
 * into their tables through `TransferBatch`. Validations already present in
 * the processed ledger are dropped as duplicates.
 *
 * @example
 * ```typescript
 * const workflow = new PreprocessSignatures({ queues, store, logger, batchSize: 100 });
 * await workflow.run('cron-42', 'web-1', 'worker-3');
 * ```
 */
export class PreprocessSignatures {
  private readonly eventBus: EventBus;
  private readonly transfer: TransferBatch;
  private readonly ledger: ProcessedValidationLedger;

  constructor(private readonly config: PreprocessSignaturesConfig) {
    assertPositiveInteger('batchSize', config.batchSize);

    this.eventBus = new EventBus((error, event) => {
      config.logger.error(
        { event: event.type, error: error instanceof Error ? error.message : String(error) },
        `Event handler for ${event.type} threw`,
      );
    });
    this.ledger = new ProcessedValidationLedger(config.store);
    this.transfer = new TransferBatch({
      queues: config.queues,
      store: config.store,
      ledger: this.ledger,
      logger: config.logger,
      eventBus: this.eventBus,
      leaseSeconds: config.leaseSeconds,
    });
  }

  /**
   * Run every queue/table pair once.
   *
   * Always resolves to `true`: per-item failures stay in the queue for the next
   * run and are only visible in logs and events. Use `runWithSummary()` to see
   * the counters.
   */
  async run(jobId: string, serverName?: string, workerName?: string, options: WorkflowOptions = {}): Promise<true> {
    await this.runWithSummary(jobId, serverName, workerName, options);
    return true;
  }

  /** Same as `run()`, resolving to the counters of every pair. */
  async runWithSummary(
    jobId: string,
    serverName?: string,
    workerName?: string,
    options: WorkflowOptions = {},
  ): Promise<WorkflowSummary> {
    const run: RunContext = { jobId, serverName, workerName };

    this.config.logger.info(
      { jobId, serverName, workerName, options },
      `Preprocess signatures workflow started. ${correlationSuffix(run)}`,
    );
    this.eventBus.emit({
      type: 'workflow:started',
      jobId,
      serverName,
      workerName,
      options,
      timestamp: Date.now(),
    });

    const results: TransferResult[] = [];
    for (const pair of this.config.transfers ?? PREPROCESS_TRANSFERS) {
      results.push(await this.processBatch(this.queueName(pair.queue), pair.table, this.config.batchSize, run));
    }

    this.eventBus.emit({ type: 'workflow:completed', jobId, results, timestamp: Date.now() });
    return { jobId, results };
  }

  /**
   * Drain one queue into one table. Resolves to the counters of that pair.
   * Rejects only when `maxBatchSize` is not a positive integer; item and queue
   * errors end up in the counters.
   */
  async processBatch(
    queueName: string,
    table: TargetTable,
    maxBatchSize: number,
    run: RunContext,
  ): Promise<TransferResult> {
    assertPositiveInteger('maxBatchSize', maxBatchSize);
    const result: BatchResult = await this.transfer.execute(queueName, table, maxBatchSize, run);
    return { queueName, table, result };
  }

  /** Whether a validation key is in the processed ledger. */
  async isProcessed(secretValidationKey: string): Promise<boolean> {
    return this.ledger.isProcessed(secretValidationKey);
  }

  /** Full queue name for a base name, with the configured prefix. */
  queueName(base: string): string {
    return `${this.config.queuePrefix ?? ''}${base}`;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
