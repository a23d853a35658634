import type { FlatRow } from '../record/RecordFlattener';
import type { FrozenSchema } from './UnifiedSchema';

/**
 * Align a row to the header: one value per schema column, in schema order,
 * "" where the row has no such column. Columns outside the schema are dropped.
 */
export function assembleRow(row: FlatRow, schema: FrozenSchema): string[] {
  return schema.columns.map(column => row.get(column) ?? '');
}
