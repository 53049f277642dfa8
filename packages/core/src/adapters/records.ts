import type {
  Cell,
  GeneratedRecord,
  GeneratedTable,
} from '../types/column.js';

/**
 * Row-major view of a generated table: one object per row, keys in column order.
 */
export function toRecords(table: GeneratedTable): GeneratedRecord[] {
  const records: GeneratedRecord[] = [];
  for (let row = 0; row < table.rowCount; row++) {
    // fromEntries defines own keys, so names such as "__proto__" survive
    const record: GeneratedRecord = Object.fromEntries(
      table.columns.map((column): [string, Cell] => [
        column.name,
        column.values[row] ?? null,
      ])
    );
    records.push(record);
  }
  return records;
}

export function columnNames(table: GeneratedTable): string[] {
  return table.columns.map((column) => column.name);
}
