/**
 * Apache Arrow adapter
 * The only module that depends on a table library. Missing cells become
 * Arrow nulls, so downstream consumers see them in `nullCount`.
 */

import {
  Dictionary,
  Float64,
  Int32,
  Int64,
  Table,
  TimestampMillisecond,
  Utf8,
  vectorFromArray,
  type Vector,
} from 'apache-arrow';

import type { GeneratedColumn, GeneratedTable } from '../types/column.js';
import type { ArrowOptions, CategoricalEncoding } from '../types/options.js';

function toVector(
  column: GeneratedColumn,
  categorical: CategoricalEncoding
): Vector {
  switch (column.kind) {
    case 'int':
      return vectorFromArray(
        column.values.map((v) => (v === null ? null : BigInt(v))),
        new Int64()
      );
    case 'float':
      return vectorFromArray([...column.values], new Float64());
    case 'categorical':
      return categorical === 'dictionary'
        ? vectorFromArray(
            [...column.values],
            new Dictionary(new Utf8(), new Int32())
          )
        : vectorFromArray([...column.values], new Utf8());
    case 'datetime':
      // Epoch milliseconds, UTC
      return vectorFromArray(
        column.values.map((v) => (v === null ? null : v.getTime())),
        new TimestampMillisecond()
      );
  }
}

/**
 * Convert a generated table into an Arrow Table with one nullable field per
 * column, in declaration order.
 */
export function toArrowTable(
  table: GeneratedTable,
  options: ArrowOptions = {}
): Table {
  const categorical = options.categorical ?? 'dictionary';
  const vectors: Record<string, Vector> = Object.fromEntries(
    table.columns.map((column): [string, Vector] => [
      column.name,
      toVector(column, categorical),
    ])
  );
  // Object keys that look like integers are enumerated first; re-select to
  // restore declaration order.
  return new Table(vectors).select(table.columns.map((c) => c.name));
}
