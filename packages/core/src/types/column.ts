/**
 * Column specifications and the library-neutral generated table.
 */

export type ColumnKind = 'int' | 'float' | 'categorical' | 'datetime';

export const COLUMN_KINDS: readonly ColumnKind[] = [
  'int',
  'float',
  'categorical',
  'datetime',
];

/**
 * Null-injection settings shared by every column kind.
 * `noneProbability` is an integer percent and only applies when `allowNone` is set.
 */
export interface NullOptions {
  allowNone?: boolean;
  noneProbability?: number;
}

interface BaseColumnSpec {
  readonly name: string;
  readonly allowNone: boolean;
  readonly noneProbability: number;
}

export interface IntColumnSpec extends BaseColumnSpec {
  readonly kind: 'int';
  readonly minVal: number;
  readonly maxVal: number;
}

export interface FloatColumnSpec extends BaseColumnSpec {
  readonly kind: 'float';
  readonly minVal: number;
  readonly maxVal: number;
}

export interface CategoricalColumnSpec extends BaseColumnSpec {
  readonly kind: 'categorical';
  readonly categories: readonly string[];
}

export interface DatetimeColumnSpec extends BaseColumnSpec {
  readonly kind: 'datetime';
  readonly minDate: Date;
  readonly maxDate: Date;
}

export type ColumnSpec =
  | IntColumnSpec
  | FloatColumnSpec
  | CategoricalColumnSpec
  | DatetimeColumnSpec;

/** Date bounds accept `YYYY-MM-DD`, a second-resolution ISO timestamp, or a Date. */
export type DateInput = string | Date;

/** Value type produced for each column kind. `null` marks a missing cell. */
export interface CellValueByKind {
  int: number;
  float: number;
  categorical: string;
  datetime: Date;
}

export type Cell<K extends ColumnKind = ColumnKind> = CellValueByKind[K] | null;

export type GeneratedColumn = {
  [K in ColumnKind]: {
    readonly name: string;
    readonly kind: K;
    readonly values: readonly Cell<K>[];
  };
}[ColumnKind];

export interface ColumnMetrics {
  nullsInjected: number;
}

export interface GenerationMetrics {
  generateMs: number;
  rows: number;
  cells: number;
  columns: Record<string, ColumnMetrics>;
}

/**
 * Column-major table produced by the row generator.
 * Created fresh per call; the generator keeps no reference to it.
 */
export interface GeneratedTable {
  readonly rowCount: number;
  readonly columns: readonly GeneratedColumn[];
  /** Seed the PRNG was initialised with; pass it back to reproduce the table. */
  readonly seed: number;
  readonly metrics?: GenerationMetrics;
}

export type GeneratedRecord = Record<string, Cell>;
