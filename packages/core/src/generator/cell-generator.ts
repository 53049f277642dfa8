/**
 * Per-cell generation: one exhaustive switch over the column kinds.
 * Each branch is a pure function of the spec and the PRNG.
 */

import type {
  Cell,
  CategoricalColumnSpec,
  ColumnSpec,
  DatetimeColumnSpec,
  FloatColumnSpec,
  IntColumnSpec,
} from '../types/column.js';
import type { Mulberry32 } from '../util/rng.js';

/**
 * Null-injection step: draw an integer in [0, 100) and compare it with the
 * column's percent. Columns without `allowNone` never consume a draw here.
 */
export function shouldInjectNull(spec: ColumnSpec, rng: Mulberry32): boolean {
  if (!spec.allowNone) return false;
  return rng.nextInt(0, 99) < spec.noneProbability;
}

export function generateInt(spec: IntColumnSpec, rng: Mulberry32): number {
  return rng.nextInt(spec.minVal, spec.maxVal);
}

export function generateFloat(spec: FloatColumnSpec, rng: Mulberry32): number {
  const value = spec.minVal + (spec.maxVal - spec.minVal) * rng.nextFloat01();
  return Math.min(value, spec.maxVal);
}

export function generateCategory(
  spec: CategoricalColumnSpec,
  rng: Mulberry32
): string {
  return rng.pick(spec.categories);
}

/**
 * Whole-second offset from `minDate`, drawn over the inclusive span.
 */
export function generateDatetime(
  spec: DatetimeColumnSpec,
  rng: Mulberry32
): Date {
  const minMs = spec.minDate.getTime();
  const spanSeconds = Math.floor((spec.maxDate.getTime() - minMs) / 1000);
  const offset = rng.nextInt(0, spanSeconds);
  return new Date(minMs + offset * 1000);
}

/**
 * Draw one cell: the null-injection step first, then the kind's value.
 * The overloads keep the cell type of a statically known kind.
 */
export function generateCell(spec: IntColumnSpec, rng: Mulberry32): Cell<'int'>;
export function generateCell(spec: FloatColumnSpec, rng: Mulberry32): Cell<'float'>;
export function generateCell(
  spec: CategoricalColumnSpec,
  rng: Mulberry32
): Cell<'categorical'>;
export function generateCell(
  spec: DatetimeColumnSpec,
  rng: Mulberry32
): Cell<'datetime'>;
export function generateCell(spec: ColumnSpec, rng: Mulberry32): Cell;
export function generateCell(spec: ColumnSpec, rng: Mulberry32): Cell {
  if (shouldInjectNull(spec, rng)) {
    return null;
  }
  switch (spec.kind) {
    case 'int':
      return generateInt(spec, rng);
    case 'float':
      return generateFloat(spec, rng);
    case 'categorical':
      return generateCategory(spec, rng);
    case 'datetime':
      return generateDatetime(spec, rng);
    default: {
      const unreachable: never = spec;
      throw new TypeError(
        `Unsupported column kind: ${JSON.stringify(unreachable)}`
      );
    }
  }
}
