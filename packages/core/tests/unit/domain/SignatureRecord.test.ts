import { describe, it, expect } from 'vitest';
import { parseQueuePayload, readValidationKey } from '../../../src/domain/model/SignatureRecord.js';
import { isEmptyPayload } from '../../../src/domain/model/QueueItem.js';
import { pendingSignaturePayload, validationPayload } from '../../helpers.js';

describe('parseQueuePayload', () => {
  describe('pending signatures', () => {
    it('should produce a pending_signature record with signup coerced to 1', () => {
      const result = parseQueuePayload('signatures_pending_validation', pendingSignaturePayload('key-1'));

      expect(result).toEqual({
        ok: true,
        record: {
          kind: 'pending_signature',
          row: {
            secret_validation_key: 'key-1',
            signature_source_api_key: 'test-api-key',
            petition_id: 'petition-1',
            first_name: 'Ada',
            last_name: 'Lovelace',
            zip: '12345',
            email: 'key-1@example.com',
            signup: 1,
            timestamp_petition_close: 1700000000,
            timestamp_validation_close: 1700086400,
            timestamp_received_new_signature: 1699990000,
            timestamp_initiated_signature_validation: 1699990005,
          },
        },
      });
    });

    it.each([
      [true, 1],
      [false, 0],
      [1, 1],
      [0, 0],
      ['0', 0],
      ['true', 1],
      ['FALSE', 0],
      [' 1 ', 1],
      [null, 0],
      ['', 0],
    ])('should normalize signup %j to %i', (signup, expected) => {
      const result = parseQueuePayload('signatures_pending_validation', pendingSignaturePayload('key-1', { signup }));

      expect(result.ok).toBe(true);
      if (result.ok && result.record.kind === 'pending_signature') {
        expect(result.record.row.signup).toBe(expected);
      }
    });

    it('should default signup to 0 and zip to null when absent', () => {
      const payload = pendingSignaturePayload('key-1');
      delete payload['signup'];
      delete payload['zip'];

      const result = parseQueuePayload('signatures_pending_validation', payload);

      expect(result.ok).toBe(true);
      if (result.ok && result.record.kind === 'pending_signature') {
        expect(result.record.row.signup).toBe(0);
        expect(result.record.row.zip).toBeNull();
      }
    });

    it('should coerce numeric timestamp strings to integers', () => {
      const result = parseQueuePayload(
        'signatures_pending_validation',
        pendingSignaturePayload('key-1', { timestamp_petition_close: '1700000123' }),
      );

      expect(result.ok).toBe(true);
      if (result.ok && result.record.kind === 'pending_signature') {
        expect(result.record.row.timestamp_petition_close).toBe(1700000123);
      }
    });

    it('should reject a signup value that is not a flag', () => {
      const result = parseQueuePayload('signatures_pending_validation', pendingSignaturePayload('key-1', { signup: 'yes' }));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('INVALID');
        expect(result.error).toContain('signup');
      }
    });

    it('should drop fields the table has no column for', () => {
      const result = parseQueuePayload(
        'signatures_pending_validation',
        pendingSignaturePayload('key-1', { favourite_colour: 'blue', user_agent: 'test-agent' }),
      );

      expect(result).toEqual(parseQueuePayload('signatures_pending_validation', pendingSignaturePayload('key-1')));
    });

    it('should keep an internationalized email address as sent', () => {
      const result = parseQueuePayload(
        'signatures_pending_validation',
        pendingSignaturePayload('key-1', { email: 'jörg@müller.de' }),
      );

      expect(result.ok).toBe(true);
      if (result.ok && result.record.kind === 'pending_signature') {
        expect(result.record.row.email).toBe('jörg@müller.de');
      }
    });

    it('should still reject a wrong type next to an unknown field', () => {
      const result = parseQueuePayload(
        'signatures_pending_validation',
        pendingSignaturePayload('key-1', { extra: 'x', first_name: 7 }),
      );

      expect(result).toEqual({ ok: false, reason: 'INVALID', error: 'first_name: Expected string, received number' });
    });

    it('should reject a payload missing a required field', () => {
      const payload = pendingSignaturePayload('key-1');
      delete payload['petition_id'];

      const result = parseQueuePayload('signatures_pending_validation', payload);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('petition_id: Required');
      }
    });
  });

  describe('validations', () => {
    it('should produce a validation record', () => {
      const result = parseQueuePayload('validations', validationPayload('key-2'));

      expect(result).toEqual({
        ok: true,
        record: {
          kind: 'validation',
          row: {
            secret_validation_key: 'key-2',
            petition_id: 'petition-1',
            client_ip: '192.0.2.10',
            timestamp_received_signature_validation: 1699995000,
          },
        },
      });
    });

    it('should reject a pending signature payload sent to the validations table', () => {
      const result = parseQueuePayload('validations', pendingSignaturePayload('key-2'));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.reason).toBe('INVALID');
      }
    });

    it('should reject a negative timestamp', () => {
      const result = parseQueuePayload(
        'validations',
        validationPayload('key-2', { timestamp_received_signature_validation: -5 }),
      );

      expect(result.ok).toBe(false);
    });

    it('should reject a payload that is not an object', () => {
      const result = parseQueuePayload('validations', ['key-2']);

      expect(result).toEqual({ ok: false, reason: 'INVALID', error: '(payload): Expected object, received array' });
    });
  });

  describe('empty payloads', () => {
    it.each([null, undefined, '', {}, { malformed: null }, { a: '', b: undefined }])(
      'should report %j as EMPTY',
      (data) => {
        expect(parseQueuePayload('validations', data)).toEqual({
          ok: false,
          reason: 'EMPTY',
          error: 'Queue item has no data',
        });
      },
    );
  });
});

describe('readValidationKey', () => {
  it('should read the key from a payload that carries nothing else', () => {
    expect(readValidationKey({ secret_validation_key: 'X' })).toBe('X');
  });

  it('should trim the key', () => {
    expect(readValidationKey({ secret_validation_key: ' X ', petition_id: 'petition-1' })).toBe('X');
  });

  it.each([null, 'X', {}, { secret_validation_key: '' }, { secret_validation_key: 5 }])(
    'should return null for %j',
    (data) => {
      expect(readValidationKey(data)).toBeNull();
    },
  );
});

describe('isEmptyPayload', () => {
  it('should treat a payload with one filled field as not empty', () => {
    expect(isEmptyPayload({ a: null, b: 'x' })).toBe(false);
  });

  it('should treat numbers and arrays as not empty', () => {
    expect(isEmptyPayload(0)).toBe(false);
    expect(isEmptyPayload([])).toBe(false);
  });
});
