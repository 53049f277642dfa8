import {
  ConfigurationError,
  ErrorCode,
  type NullOptions,
  type SchemaBuilder,
  ValidationError,
} from '@rowforge/core';

export type OutputFormat = 'markdown' | 'csv' | 'json' | 'ndjson';

const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'markdown',
  'csv',
  'json',
  'ndjson',
];

export const DEFAULT_ROW_COUNT = 10;

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  rows?: string | number;
  count?: string | number;
  seed?: string | number;
  out?: string;
  printMetrics?: boolean;
  debugConfig?: boolean;
}

/**
 * A column declaration parsed from `name:kind:args[@noneProbability]`.
 */
export type ColumnArg =
  | { kind: 'int' | 'float'; name: string; min: number; max: number; nulls: NullOptions }
  | { kind: 'categorical'; name: string; categories: string[]; nulls: NullOptions }
  | { kind: 'datetime'; name: string; min: string; max: string; nulls: NullOptions };

const KIND_ALIASES: Record<string, ColumnArg['kind']> = {
  int: 'int',
  integer: 'int',
  float: 'float',
  cat: 'categorical',
  categorical: 'categorical',
  datetime: 'datetime',
  date: 'datetime',
};

const NONE_SUFFIX_RE = /@(\d+)$/;
const DATE_PAIR_RE =
  /^(\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}:\d{2}Z?)?):(\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}:\d{2}Z?)?)$/;

const COLUMN_SYNTAX =
  'Use name:kind:args, e.g. age:int:0:99, score:float:0:1.5, city:cat:NY,LA or seen:datetime:2020-01-01:2023-02-01';

/**
 * Parse one positional column declaration.
 * Bounds and categories are only checked syntactically here; the schema
 * builder validates their values.
 */
export function parseColumnArg(raw: string): ColumnArg {
  let body = raw;
  let nulls: NullOptions = {};
  const suffix = NONE_SUFFIX_RE.exec(body);
  if (suffix?.[1] !== undefined) {
    nulls = { allowNone: true, noneProbability: Number(suffix[1]) };
    body = body.slice(0, suffix.index);
  }

  const first = body.indexOf(':');
  const second = first < 0 ? -1 : body.indexOf(':', first + 1);
  if (first < 0 || second < 0) {
    throw syntaxError(raw, body.slice(0, Math.max(first, 0)) || raw);
  }
  const name = body.slice(0, first);
  const kindToken = body.slice(first + 1, second).toLowerCase();
  const args = body.slice(second + 1);
  const kind = KIND_ALIASES[kindToken];

  switch (kind) {
    case 'int':
    case 'float': {
      const parts = args.split(':');
      const [min, max] = parts.map(parseNumber);
      if (parts.length !== 2 || min === undefined || max === undefined) {
        throw syntaxError(raw, name, `${kind} columns take min:max`);
      }
      return { kind, name, min, max, nulls };
    }
    case 'categorical': {
      const categories = args.split(',').map((c) => c.trim());
      return { kind, name, categories: args === '' ? [] : categories, nulls };
    }
    case 'datetime': {
      const match = DATE_PAIR_RE.exec(args);
      if (match?.[1] === undefined || match[2] === undefined) {
        throw syntaxError(raw, name, 'datetime columns take minDate:maxDate');
      }
      return { kind, name, min: match[1], max: match[2], nulls };
    }
    default:
      throw syntaxError(raw, name, `unknown kind "${kindToken}"`);
  }
}

/**
 * Declare a parsed column on the builder.
 */
export function applyColumnArg(
  schema: SchemaBuilder,
  column: ColumnArg
): SchemaBuilder {
  switch (column.kind) {
    case 'int':
      return schema.addIntCol(column.name, column.min, column.max, column.nulls);
    case 'float':
      return schema.addFloatCol(column.name, column.min, column.max, column.nulls);
    case 'categorical':
      return schema.addCatCol(column.name, column.categories, column.nulls);
    case 'datetime':
      return schema.addDatetimeCol(column.name, column.min, column.max, column.nulls);
  }
}

/**
 * Resolve rows/count into a single non-negative integer.
 *
 * - If neither flag is provided, defaults to 10.
 * - If both are provided, they must agree on the same numeric value.
 */
export function resolveRowCount(
  options: Pick<CliOptions, 'rows' | 'count'>
): number {
  const provided: Array<[string, string | number]> = [];
  if (options.rows !== undefined) provided.push(['rows', options.rows]);
  if (options.count !== undefined) provided.push(['count', options.count]);

  if (provided.length === 0) {
    return DEFAULT_ROW_COUNT;
  }

  const parsed = provided.map(([name, value]): [string, number] => {
    const num = typeof value === 'number' ? value : parseNumber(value);
    if (num === undefined || !Number.isSafeInteger(num) || num < 0) {
      throw new ValidationError({
        message: `Invalid --${name} value "${String(value)}". Expected a non-negative integer.`,
        errorCode: ErrorCode.INVALID_ROW_COUNT,
        context: { field: name, value },
      });
    }
    return [name, num];
  });

  const firstValue = parsed[0]?.[1] ?? DEFAULT_ROW_COUNT;
  if (parsed.some(([, value]) => value !== firstValue)) {
    const names = parsed.map(([n]) => `--${n}`).join(', ');
    throw new ValidationError({
      message: `Conflicting row count flags (${names}) with different values.`,
      errorCode: ErrorCode.INVALID_ROW_COUNT,
      context: { field: 'rows', value: parsed.map(([, v]) => v) },
    });
  }
  return firstValue;
}

/**
 * Resolve the --seed flag; undefined lets the generator draw one.
 */
export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined || value === '') return undefined;
  const seed = typeof value === 'number' ? value : parseNumber(String(value));
  if (seed === undefined || !Number.isSafeInteger(seed)) {
    throw new ConfigurationError({
      message: `Invalid --seed value "${String(value)}". Expected an integer.`,
      context: { field: 'seed', value },
    });
  }
  return seed;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'markdown';
  }
  const raw = String(value).toLowerCase();
  const format = OUTPUT_FORMATS.find((f) => f === raw);
  if (format) return format;
  throw new ConfigurationError({
    message: `Invalid --out value "${String(value)}". Supported formats are ${OUTPUT_FORMATS.map((f) => `"${f}"`).join(', ')}.`,
    context: { field: 'out', value },
  });
}

function parseNumber(token: string): number | undefined {
  if (token.trim() === '') return undefined;
  const num = Number(token);
  return Number.isFinite(num) ? num : undefined;
}

function syntaxError(raw: string, column: string, reason?: string): ValidationError {
  return new ValidationError({
    message: reason
      ? `Invalid column declaration "${raw}": ${reason}`
      : `Invalid column declaration "${raw}"`,
    errorCode: ErrorCode.INVALID_COLUMN_SPEC,
    context: { column, value: raw, suggestion: COLUMN_SYNTAX },
  });
}
