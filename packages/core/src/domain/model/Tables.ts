import {
  pendingSignatureRowSchema,
  processedValidationRowSchema,
  validationRowSchema,
} from './SignatureRecord.js';
import type { PendingSignatureRow, ProcessedValidationRow, ValidationRow } from './SignatureRecord.js';
import type { z } from 'zod';

/** Row type of every table the workflow reads or writes. */
export interface TableRows {
  signatures_pending_validation: PendingSignatureRow;
  validations: ValidationRow;
  validations_processed: ProcessedValidationRow;
}

export type TableName = keyof TableRows;

/** Tables fed from a queue. */
export type TargetTable = 'signatures_pending_validation' | 'validations';

export type ColumnOf<T extends TableName> = keyof TableRows[T] & string;

export const Tables = {
  PENDING_SIGNATURES: 'signatures_pending_validation',
  VALIDATIONS: 'validations',
  PROCESSED_VALIDATIONS: 'validations_processed',
} as const satisfies Record<string, TableName>;

const COLUMNS: { readonly [T in TableName]: readonly ColumnOf<T>[] } = {
  signatures_pending_validation: Object.keys(pendingSignatureRowSchema.shape).filter(
    (c): c is ColumnOf<'signatures_pending_validation'> => c in pendingSignatureRowSchema.shape,
  ),
  validations: Object.keys(validationRowSchema.shape).filter(
    (c): c is ColumnOf<'validations'> => c in validationRowSchema.shape,
  ),
  validations_processed: Object.keys(processedValidationRowSchema.shape).filter(
    (c): c is ColumnOf<'validations_processed'> => c in processedValidationRowSchema.shape,
  ),
};

const ROW_SCHEMAS: { readonly [T in TableName]: z.ZodType<TableRows[T], z.ZodTypeDef, unknown> } = {
  signatures_pending_validation: pendingSignatureRowSchema,
  validations: validationRowSchema,
  validations_processed: processedValidationRowSchema,
};

/** Ordered column names of a table, excluding the generated primary key. */
export function columnsOf<T extends TableName>(table: T): readonly ColumnOf<T>[] {
  return COLUMNS[table];
}

/** Schema a row of `table` must satisfy. Also normalizes values read back from storage. */
export function rowSchemaOf<T extends TableName>(table: T): z.ZodType<TableRows[T], z.ZodTypeDef, unknown> {
  return ROW_SCHEMAS[table];
}

/** A queue drained into a table by one pass of the worker. */
export interface TransferPair {
  /** Queue name without the configured prefix. */
  readonly queue: string;
  readonly table: TargetTable;
}

/** Pairs processed by the preprocess-signatures workflow, in order. */
export const PREPROCESS_TRANSFERS: readonly TransferPair[] = [
  { queue: 'signatures_pending_validation_queue', table: Tables.PENDING_SIGNATURES },
  { queue: 'validations_queue', table: Tables.VALIDATIONS },
];
