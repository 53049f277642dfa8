// @rowforge/core entry point
//
// - newSchema()/SchemaBuilder: declare columns, then generate() for the
//   library-neutral table or generateDataframe() for an Apache Arrow Table.
// - generateTable()/generateCell(): the engine, usable without a builder.
// - Errors carry stable codes (ErrorCode) and exit codes for the CLI.

export { SchemaBuilder, newSchema } from './schema/schema-builder.js';
export { parseDateInput } from './schema/dates.js';

export {
  generateTable,
  assertRowCount,
  type RowGeneratorDeps,
} from './generator/row-generator.js';
export { generateCell } from './generator/cell-generator.js';

export { toArrowTable } from './adapters/arrow.js';
export { toRecords, columnNames } from './adapters/records.js';

export type {
  Cell,
  CellValueByKind,
  CategoricalColumnSpec,
  ColumnKind,
  ColumnMetrics,
  ColumnSpec,
  DateInput,
  DatetimeColumnSpec,
  FloatColumnSpec,
  GeneratedColumn,
  GeneratedRecord,
  GeneratedTable,
  GenerationMetrics,
  IntColumnSpec,
  NullOptions,
} from './types/column.js';
export { COLUMN_KINDS } from './types/column.js';

export {
  resolveOptions,
  mergeOptions,
  DEFAULT_OPTIONS,
  type ArrowOptions,
  type CategoricalEncoding,
  type GenerateOptions,
  type ResolvedOptions,
} from './types/options.js';

export {
  RowforgeError,
  ValidationError,
  StateError,
  ConfigurationError,
  InternalError,
  isRowforgeError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export { ErrorCode, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';

export { Mulberry32, randomSeed } from './util/rng.js';
export { MetricsCollector } from './util/metrics.js';
