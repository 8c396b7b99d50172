// Main entry point
export { PreprocessSignatures } from './PreprocessSignatures.js';
export type { PreprocessSignaturesConfig, WorkflowOptions } from './PreprocessSignatures.js';

// Domain model
export type { QueueItem, QueueItemId } from './domain/model/QueueItem.js';
export { isEmptyPayload } from './domain/model/QueueItem.js';
export type {
  PendingSignatureRow,
  ValidationRow,
  ProcessedValidationRow,
  PendingSignatureRecord,
  ValidationRecord,
  SignatureRecord,
  MalformedReason,
  ParsePayloadResult,
} from './domain/model/SignatureRecord.js';
export {
  parseQueuePayload,
  readValidationKey,
  pendingSignatureRowSchema,
  validationRowSchema,
  processedValidationRowSchema,
} from './domain/model/SignatureRecord.js';
export type { TableRows, TableName, TargetTable, ColumnOf, TransferPair } from './domain/model/Tables.js';
export { Tables, columnsOf, rowSchemaOf, PREPROCESS_TRANSFERS } from './domain/model/Tables.js';
export type { BatchResult, TransferResult, WorkflowSummary } from './domain/model/BatchResult.js';
export { emptyBatchResult, isCleanBatch, isCleanRun } from './domain/model/BatchResult.js';
export type { RunContext } from './domain/model/RunContext.js';
export { correlationSuffix } from './domain/model/RunContext.js';
export { ConfigurationError } from './domain/errors/ConfigurationError.js';

// Domain services
export { ProcessedValidationLedger } from './domain/services/ProcessedValidationLedger.js';

// Application internals (for custom schedulers)
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorFn } from './application/EventBus.js';
export { TransferBatch } from './application/usecases/TransferBatch.js';
export type { TransferDependencies } from './application/usecases/TransferBatch.js';

// Ports (for custom implementations)
export type { SignatureQueue, QueueProvider } from './domain/ports/SignatureQueue.js';
export type { RecordStore } from './domain/ports/RecordStore.js';
export type { WorkflowLogger, LogFields } from './domain/ports/WorkflowLogger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  WorkflowStartedEvent,
  WorkflowCompletedEvent,
  BatchStartedEvent,
  BatchCompletedEvent,
  ItemSavedEvent,
  ItemSkippedEvent,
  ItemFailedEvent,
  ItemMalformedEvent,
} from './domain/events/DomainEvents.js';

// Configuration and logging
export { loadWorkflowConfig } from './config/loadWorkflowConfig.js';
export type { WorkflowConfig } from './config/loadWorkflowConfig.js';
export { createLogger, NOTICE_LEVEL } from './infrastructure/logging/createLogger.js';
export type { SignatureLogger, CreateLoggerOptions } from './infrastructure/logging/createLogger.js';

// Infrastructure adapters (in-memory queue and store)
export { InMemoryQueue, InMemoryQueueProvider } from './infrastructure/queue/InMemoryQueue.js';
export type { InMemoryQueueOptions } from './infrastructure/queue/InMemoryQueue.js';
export { InMemoryRecordStore, UniqueConstraintViolation } from './infrastructure/storage/InMemoryRecordStore.js';
export type { InMemoryRecordStoreOptions } from './infrastructure/storage/InMemoryRecordStore.js';
