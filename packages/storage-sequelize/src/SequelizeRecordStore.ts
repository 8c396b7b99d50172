import type { Sequelize } from 'sequelize';
import type { ColumnOf, RecordStore, TableName, TableRows } from '@signature-relay/core';
import { defineTableModels } from './models/SignatureTableModels.js';
import type { TableModels } from './models/SignatureTableModels.js';
import * as RowMapper from './mappers/RowMapper.js';

/**
 * Sequelize-based `RecordStore` for the signature tables.
 *
 * The connection is the `Sequelize` instance passed in; any dialect Sequelize
 * supports works. `validations_processed.secret_validation_key` carries a
 * unique index, so a second insert of the same key rejects.
 *
 * Call `initialize()` after construction to create tables.
 */
export class SequelizeRecordStore implements RecordStore {
  private readonly models: TableModels;

  constructor(sequelize: Sequelize) {
    this.models = defineTableModels(sequelize);
  }

  async initialize(): Promise<void> {
    await this.models.signatures_pending_validation.sync();
    await this.models.validations.sync();
    await this.models.validations_processed.sync();
  }

  async insert<T extends TableName>(table: T, row: TableRows[T]): Promise<number> {
    const created = await this.models[table].create({ ...row });
    return Number(created.get('id'));
  }

  async exists<T extends TableName>(table: T, column: ColumnOf<T>, value: string | number): Promise<boolean> {
    const found = await this.models[table].findOne({ where: { [column]: value }, attributes: ['id'] });
    return found !== null;
  }

  /** All rows of `table` in insertion order. */
  async rows<T extends TableName>(table: T): Promise<TableRows[T][]> {
    const found = await this.models[table].findAll({ order: [['id', 'ASC']] });
    return found.map((r) => RowMapper.toDomain(table, r.get({ plain: true })));
  }
}
