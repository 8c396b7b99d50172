import type { ColumnOf, TableName, TableRows } from '../model/Tables.js';

/**
 * Port for the relational tables the workflow writes to.
 *
 * Implementations receive their connection handle explicitly (constructor
 * argument); nothing is resolved from global state.
 */
export interface RecordStore {
  /** Insert one row. Resolves to the generated row id; rejects on constraint or connection failure. */
  insert<T extends TableName>(table: T, row: TableRows[T]): Promise<number>;
  /** Check whether any row has `column = value`. */
  exists<T extends TableName>(table: T, column: ColumnOf<T>, value: string | number): Promise<boolean>;
}
