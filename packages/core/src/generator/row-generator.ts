/**
 * Row Generator
 * Materialises a column-major table from an ordered list of column specs.
 * Columns are generated independently, in declaration order.
 */

import { ErrorCode } from '../errors/codes.js';
import type {
  ColumnSpec,
  GeneratedColumn,
  GeneratedTable,
} from '../types/column.js';
import { StateError, ValidationError } from '../types/errors.js';
import { type GenerateOptions, resolveOptions } from '../types/options.js';
import { MetricsCollector } from '../util/metrics.js';
import { Mulberry32, randomSeed } from '../util/rng.js';
import { generateCell } from './cell-generator.js';

export interface RowGeneratorDeps {
  /** Clock used for metrics; defaults to performance.now() */
  now?: () => number;
}

interface FilledColumn<T> {
  values: (T | null)[];
  nulls: number;
}

function fillColumn<T>(rowCount: number, draw: () => T | null): FilledColumn<T> {
  const values: (T | null)[] = [];
  let nulls = 0;
  for (let row = 0; row < rowCount; row++) {
    const cell = draw();
    if (cell === null) nulls++;
    values.push(cell);
  }
  return { values, nulls };
}

function generateColumn(
  spec: ColumnSpec,
  rowCount: number,
  rng: Mulberry32
): { column: GeneratedColumn; nulls: number } {
  switch (spec.kind) {
    case 'int': {
      const intSpec = spec;
      const { values, nulls } = fillColumn(rowCount, () =>
        generateCell(intSpec, rng)
      );
      return { column: { name: spec.name, kind: 'int', values }, nulls };
    }
    case 'float': {
      const floatSpec = spec;
      const { values, nulls } = fillColumn(rowCount, () =>
        generateCell(floatSpec, rng)
      );
      return { column: { name: spec.name, kind: 'float', values }, nulls };
    }
    case 'categorical': {
      const catSpec = spec;
      const { values, nulls } = fillColumn(rowCount, () =>
        generateCell(catSpec, rng)
      );
      return {
        column: { name: spec.name, kind: 'categorical', values },
        nulls,
      };
    }
    case 'datetime': {
      const dateSpec = spec;
      const { values, nulls } = fillColumn(rowCount, () =>
        generateCell(dateSpec, rng)
      );
      return { column: { name: spec.name, kind: 'datetime', values }, nulls };
    }
  }
}

export function assertRowCount(rowCount: unknown): asserts rowCount is number {
  if (
    typeof rowCount !== 'number' ||
    !Number.isSafeInteger(rowCount) ||
    rowCount < 0
  ) {
    throw new ValidationError({
      message: `Row count must be a non-negative integer, got ${String(rowCount)}`,
      errorCode: ErrorCode.INVALID_ROW_COUNT,
      context: { field: 'rows', value: rowCount },
    });
  }
}

/**
 * Generate `rowCount` rows for the given columns.
 *
 * Throws StateError when `columns` is empty and ValidationError for a bad
 * row count; both checks run before any value is drawn.
 */
export function generateTable(
  columns: readonly ColumnSpec[],
  rowCount: number,
  options: GenerateOptions = {},
  deps: RowGeneratorDeps = {}
): GeneratedTable {
  if (columns.length === 0) {
    throw new StateError({
      message: 'No columns defined',
      errorCode: ErrorCode.EMPTY_SCHEMA,
      context: { suggestion: 'Declare at least one column before generating' },
    });
  }
  assertRowCount(rowCount);

  const resolved = resolveOptions(options);
  const seed = resolved.seed ?? randomSeed();
  const rng = new Mulberry32(seed);
  const metrics = new MetricsCollector({
    enabled: resolved.metrics,
    now: deps.now,
  });

  metrics.begin();
  const generated: GeneratedColumn[] = [];
  for (const spec of columns) {
    const { column, nulls } = generateColumn(spec, rowCount, rng);
    metrics.recordColumn(spec.name, rowCount, nulls);
    generated.push(column);
  }
  metrics.end();

  return {
    rowCount,
    columns: generated,
    seed,
    metrics: metrics.snapshot(),
  };
}
