import type { ColumnOf, TableName, TableRows } from '../../domain/model/Tables.js';
import type { RecordStore } from '../../domain/ports/RecordStore.js';

/** Rows of one table, keyed by generated id. */
type TableData<T extends TableName> = Map<number, TableRows[T]>;

type UniqueColumns = { readonly [T in TableName]?: readonly ColumnOf<T>[] };

export interface InMemoryRecordStoreOptions {
  /**
   * Columns that reject a second row with the same value.
   * Default: `secret_validation_key` on `validations_processed`.
   */
  readonly uniqueColumns?: UniqueColumns;
}

/** Thrown when an insert would break a unique column. */
export class UniqueConstraintViolation extends Error {
  constructor(
    readonly table: TableName,
    readonly column: string,
    readonly value: unknown,
  ) {
    super(`Duplicate value for ${table}.${column}: ${String(value)}`);
    this.name = 'UniqueConstraintViolation';
  }
}

/** Non-persistent record store. */
export class InMemoryRecordStore implements RecordStore {
  private readonly tables: { [T in TableName]: TableData<T> } = {
    signatures_pending_validation: new Map(),
    validations: new Map(),
    validations_processed: new Map(),
  };
  private nextId = 1;
  private readonly uniqueColumns: UniqueColumns;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.uniqueColumns = options.uniqueColumns ?? { validations_processed: ['secret_validation_key'] };
  }

  insert<T extends TableName>(table: T, row: TableRows[T]): Promise<number> {
    const data: TableData<T> = this.tables[table];
    const unique: readonly ColumnOf<T>[] = this.uniqueColumns[table] ?? [];

    for (const column of unique) {
      for (const existing of data.values()) {
        if (existing[column] === row[column]) {
          return Promise.reject(new UniqueConstraintViolation(table, column, row[column]));
        }
      }
    }

    const id = this.nextId++;
    data.set(id, { ...row });
    return Promise.resolve(id);
  }

  exists<T extends TableName>(table: T, column: ColumnOf<T>, value: string | number): Promise<boolean> {
    const data: TableData<T> = this.tables[table];
    for (const row of data.values()) {
      if (row[column] === value) return Promise.resolve(true);
    }
    return Promise.resolve(false);
  }

  /** All rows of a table, in insertion order. */
  rows<T extends TableName>(table: T): readonly TableRows[T][] {
    const data: TableData<T> = this.tables[table];
    return [...data.values()];
  }
}
