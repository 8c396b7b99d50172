import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, ModelAttributeColumnOptions } from 'sequelize';
import type { ColumnOf, TableName } from '@signature-relay/core';

type ColumnDefinitions<T extends TableName> = { readonly [C in ColumnOf<T>]: ModelAttributeColumnOptions };

export type TableModels = { readonly [T in TableName]: ModelStatic<Model> };

const key = (): ModelAttributeColumnOptions => ({ type: DataTypes.STRING(255), allowNull: false });
// BIGINT: timestamp values may exceed 2^31 - 1.
const timestamp = (): ModelAttributeColumnOptions => ({ type: DataTypes.BIGINT, allowNull: false });

export const pendingSignatureColumns: ColumnDefinitions<'signatures_pending_validation'> = {
  secret_validation_key: key(),
  signature_source_api_key: key(),
  petition_id: key(),
  first_name: key(),
  last_name: key(),
  zip: { type: DataTypes.STRING(32), allowNull: true, defaultValue: null },
  email: key(),
  signup: { type: DataTypes.INTEGER, allowNull: false, defaultValue: 0 },
  timestamp_petition_close: timestamp(),
  timestamp_validation_close: timestamp(),
  timestamp_received_new_signature: timestamp(),
  timestamp_initiated_signature_validation: timestamp(),
};

export const validationColumns: ColumnDefinitions<'validations'> = {
  secret_validation_key: key(),
  petition_id: key(),
  client_ip: { type: DataTypes.STRING(64), allowNull: false },
  timestamp_received_signature_validation: timestamp(),
};

export const processedValidationColumns: ColumnDefinitions<'validations_processed'> = {
  secret_validation_key: key(),
  petition_id: key(),
  timestamp_processed: timestamp(),
};

// Sequelize normalizes attribute options in place, so every model gets its own copies.
function withId(
  columns: Readonly<Record<string, ModelAttributeColumnOptions>>,
): Record<string, ModelAttributeColumnOptions> {
  const attributes: Record<string, ModelAttributeColumnOptions> = {
    id: { type: DataTypes.INTEGER, primaryKey: true, autoIncrement: true },
  };
  for (const [name, options] of Object.entries(columns)) {
    attributes[name] = { ...options };
  }
  return attributes;
}

/** Define the three signature tables on `sequelize`, each with a generated `id` key. */
export function defineTableModels(sequelize: Sequelize): TableModels {
  return {
    signatures_pending_validation: sequelize.define(
      'PendingSignature',
      withId(pendingSignatureColumns),
      {
        tableName: 'signatures_pending_validation',
        timestamps: false,
        indexes: [{ fields: ['secret_validation_key'] }, { fields: ['petition_id'] }],
      },
    ),
    validations: sequelize.define(
      'Validation',
      withId(validationColumns),
      {
        tableName: 'validations',
        timestamps: false,
        indexes: [{ fields: ['secret_validation_key'] }, { fields: ['petition_id'] }],
      },
    ),
    validations_processed: sequelize.define(
      'ProcessedValidation',
      withId(processedValidationColumns),
      {
        tableName: 'validations_processed',
        timestamps: false,
        indexes: [{ unique: true, fields: ['secret_validation_key'] }],
      },
    ),
  };
}
