import type { LogFields, WorkflowLogger } from '../src/domain/ports/WorkflowLogger.js';

export interface LogLine {
  readonly level: 'info' | 'notice' | 'error';
  readonly fields: LogFields;
  readonly message: string;
}

/** Logger that keeps every line in memory. */
export class RecordingLogger implements WorkflowLogger {
  readonly lines: LogLine[] = [];

  info(fields: LogFields, message: string): void {
    this.lines.push({ level: 'info', fields, message });
  }

  notice(fields: LogFields, message: string): void {
    this.lines.push({ level: 'notice', fields, message });
  }

  error(fields: LogFields, message: string): void {
    this.lines.push({ level: 'error', fields, message });
  }

  at(level: LogLine['level']): readonly LogLine[] {
    return this.lines.filter((l) => l.level === level);
  }
}

/** Payload as a producer would enqueue it for `signatures_pending_validation`. */
export function pendingSignaturePayload(key: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    secret_validation_key: key,
    signature_source_api_key: 'test-api-key',
    petition_id: 'petition-1',
    first_name: 'Ada',
    last_name: 'Lovelace',
    zip: '12345',
    email: `${key}@example.com`,
    signup: '1',
    timestamp_petition_close: 1700000000,
    timestamp_validation_close: 1700086400,
    timestamp_received_new_signature: 1699990000,
    timestamp_initiated_signature_validation: 1699990005,
    ...overrides,
  };
}

/** Payload as a producer would enqueue it for `validations`. */
export function validationPayload(key: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    secret_validation_key: key,
    petition_id: 'petition-1',
    client_ip: '192.0.2.10',
    timestamp_received_signature_validation: 1699995000,
    ...overrides,
  };
}
