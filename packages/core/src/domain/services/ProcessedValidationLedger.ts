import type { RecordStore } from '../ports/RecordStore.js';
import type { ProcessedValidationRow } from '../model/SignatureRecord.js';
import { processedValidationRowSchema } from '../model/SignatureRecord.js';
import { Tables } from '../model/Tables.js';

/**
 * Ledger of validations that have already gone through the whole pipeline.
 *
 * A validation whose secret key is in the ledger is a true duplicate and must
 * not be written to `validations` again.
 */
export class ProcessedValidationLedger {
  constructor(private readonly store: RecordStore) {}

  /** Single-row existence check by secret validation key. */
  async isProcessed(secretValidationKey: string): Promise<boolean> {
    return this.store.exists(Tables.PROCESSED_VALIDATIONS, 'secret_validation_key', secretValidationKey);
  }

  /** Record a key as processed. Rejects if the key is already present. */
  async markProcessed(row: ProcessedValidationRow): Promise<number> {
    return this.store.insert(Tables.PROCESSED_VALIDATIONS, processedValidationRowSchema.parse(row));
  }
}
