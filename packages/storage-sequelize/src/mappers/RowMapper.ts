import { columnsOf, rowSchemaOf } from '@signature-relay/core';
import type { TableName, TableRows } from '@signature-relay/core';

/**
 * Turn a plain model row into its domain row. The generated `id` and any
 * column the domain does not know about are left out; driver-specific
 * representations (BIGINT as string) are normalized by the row schema.
 */
export function toDomain<T extends TableName>(table: T, plain: Readonly<Record<string, unknown>>): TableRows[T] {
  const columns: Record<string, unknown> = {};
  for (const column of columnsOf(table)) {
    columns[column] = plain[column];
  }
  return rowSchemaOf(table).parse(columns);
}
