import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Sequelize } from 'sequelize';
import type { LogFields, WorkflowLogger } from '@signature-relay/core';
import { SqliteTestDriver } from './better-sqlite3-adapter.js';

export interface TestDatabase {
  readonly sequelize: Sequelize;
  dispose(): Promise<void>;
}

/** Fresh SQLite file in the temp directory, removed again by `dispose()`. */
export function openTestDatabase(): TestDatabase {
  const dbPath = path.join(os.tmpdir(), `signature-relay-${String(Date.now())}-${String(Math.random())}.sqlite`);
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage: dbPath,
    logging: false,
    dialectModule: { Database: SqliteTestDriver },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });

  return {
    sequelize,
    async dispose() {
      await sequelize.close();
      fs.rmSync(dbPath, { force: true });
    },
  };
}

export class RecordingLogger implements WorkflowLogger {
  readonly lines: { level: string; fields: LogFields; message: string }[] = [];

  info(fields: LogFields, message: string): void {
    this.lines.push({ level: 'info', fields, message });
  }

  notice(fields: LogFields, message: string): void {
    this.lines.push({ level: 'notice', fields, message });
  }

  error(fields: LogFields, message: string): void {
    this.lines.push({ level: 'error', fields, message });
  }
}

export function pendingSignature(key: string): Record<string, unknown> {
  return {
    secret_validation_key: key,
    signature_source_api_key: 'test-api-key',
    petition_id: 'petition-1',
    first_name: 'Grace',
    last_name: 'Hopper',
    zip: '',
    email: `${key}@example.com`,
    signup: 'true',
    timestamp_petition_close: '1700000000',
    timestamp_validation_close: 1700086400,
    timestamp_received_new_signature: 1699990000,
    timestamp_initiated_signature_validation: 1699990005,
  };
}

export function validation(key: string): Record<string, unknown> {
  return {
    secret_validation_key: key,
    petition_id: 'petition-1',
    client_ip: '198.51.100.7',
    timestamp_received_signature_validation: 1699995000,
  };
}
