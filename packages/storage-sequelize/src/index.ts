export { SequelizeQueue, SequelizeQueueProvider } from './SequelizeQueue.js';
export type { SequelizeQueueOptions } from './SequelizeQueue.js';
export { SequelizeRecordStore } from './SequelizeRecordStore.js';
export { defineQueueItemModel } from './models/QueueItemModel.js';
export type { QueueItemModel, QueueItemRow } from './models/QueueItemModel.js';
export {
  defineTableModels,
  pendingSignatureColumns,
  validationColumns,
  processedValidationColumns,
} from './models/SignatureTableModels.js';
export type { TableModels } from './models/SignatureTableModels.js';
