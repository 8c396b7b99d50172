import { z } from 'zod';
import { isEmptyPayload } from './QueueItem.js';
import type { TargetTable } from './Tables.js';

/** Accepts integers and integer strings (producers often send timestamps as text). */
const timestamp = z.preprocess(
  (value) => (typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value),
  z.number().int().nonnegative(),
);

/** Normalizes the opt-in flag to `0 | 1`. */
const signupFlag = z.preprocess((value) => {
  if (value === undefined || value === null || value === '') return 0;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '1' || normalized === 'true') return 1;
    if (normalized === '0' || normalized === 'false') return 0;
  }
  return value;
}, z.union([z.literal(0), z.literal(1)]));

const requiredText = z.string().trim().min(1);

export const pendingSignatureRowSchema = z
  .object({
    secret_validation_key: requiredText,
    signature_source_api_key: z.string(),
    petition_id: requiredText,
    first_name: z.string(),
    last_name: z.string(),
    zip: z.string().nullable().default(null),
    email: z.string(),
    signup: signupFlag,
    timestamp_petition_close: timestamp,
    timestamp_validation_close: timestamp,
    timestamp_received_new_signature: timestamp,
    timestamp_initiated_signature_validation: timestamp,
  });

export const validationRowSchema = z
  .object({
    secret_validation_key: requiredText,
    petition_id: requiredText,
    client_ip: z.string(),
    timestamp_received_signature_validation: timestamp,
  });

export const processedValidationRowSchema = z
  .object({
    secret_validation_key: requiredText,
    petition_id: requiredText,
    timestamp_processed: timestamp,
  });

/** Row of `signatures_pending_validation`. */
export type PendingSignatureRow = z.infer<typeof pendingSignatureRowSchema>;
/** Row of `validations`. */
export type ValidationRow = z.infer<typeof validationRowSchema>;
/** Row of the `validations_processed` ledger. */
export type ProcessedValidationRow = z.infer<typeof processedValidationRowSchema>;

export interface PendingSignatureRecord {
  readonly kind: 'pending_signature';
  readonly row: PendingSignatureRow;
}

export interface ValidationRecord {
  readonly kind: 'validation';
  readonly row: ValidationRow;
}

/** Discriminated union of every record shape a queue may carry. */
export type SignatureRecord = PendingSignatureRecord | ValidationRecord;

/** Why a payload was rejected before reaching storage. */
export type MalformedReason = 'EMPTY' | 'INVALID';

export type ParsePayloadResult =
  | { readonly ok: true; readonly record: SignatureRecord }
  | { readonly ok: false; readonly reason: MalformedReason; readonly error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(payload)'}: ${issue.message}`)
    .join('; ');
}

/** The only field needed to look a validation up in the processed ledger. */
const validationKeySchema = z.object({ secret_validation_key: requiredText });

/**
 * Secret key of a validation payload, or `null` when the payload has none.
 * Reads nothing else, so a payload can be matched against the ledger before
 * it is checked against the full row shape.
 */
export function readValidationKey(data: unknown): string | null {
  const parsed = validationKeySchema.safeParse(data);
  return parsed.success ? parsed.data.secret_validation_key : null;
}

/**
 * Turn a raw queue payload into the record shape expected by `table`.
 *
 * Fields the table has no column for are dropped. Numeric fields are
 * normalized on the way (`signup` to `0 | 1`, timestamps to integers).
 * Missing required fields and wrong types reject the payload.
 */
export function parseQueuePayload(table: TargetTable, data: unknown): ParsePayloadResult {
  if (isEmptyPayload(data)) {
    return { ok: false, reason: 'EMPTY', error: 'Queue item has no data' };
  }

  if (table === 'signatures_pending_validation') {
    const parsed = pendingSignatureRowSchema.safeParse(data);
    return parsed.success
      ? { ok: true, record: { kind: 'pending_signature', row: parsed.data } }
      : { ok: false, reason: 'INVALID', error: describeIssues(parsed.error) };
  }

  const parsed = validationRowSchema.safeParse(data);
  return parsed.success
    ? { ok: true, record: { kind: 'validation', row: parsed.data } }
    : { ok: false, reason: 'INVALID', error: describeIssues(parsed.error) };
}
