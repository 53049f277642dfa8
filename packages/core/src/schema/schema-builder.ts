import type { Table } from 'apache-arrow';

import { toArrowTable } from '../adapters/arrow.js';
import { generateTable } from '../generator/row-generator.js';
import type {
  ColumnSpec,
  DateInput,
  GeneratedTable,
  NullOptions,
} from '../types/column.js';
import {
  type GenerateOptions,
  mergeOptions,
  resolveOptions,
} from '../types/options.js';
import { unwrapOrThrow } from '../types/result.js';
import {
  type ColumnDeclaration,
  validateColumnDeclaration,
  withNullDefaults,
} from './column-validator.js';

/**
 * Accumulates column specifications in declaration order.
 *
 * Every `add*Col` call validates eagerly and throws a ValidationError without
 * touching the schema when the declaration is malformed. Generation reads the
 * schema and can be repeated with different row counts.
 */
export class SchemaBuilder {
  private readonly specs: ColumnSpec[] = [];
  private readonly names = new Set<string>();
  private readonly defaults: GenerateOptions;

  constructor(defaults: GenerateOptions = {}) {
    // Fail fast on bad defaults instead of on the first generate() call.
    resolveOptions(defaults);
    this.defaults = defaults;
  }

  /** Integer column, uniform over [minVal, maxVal] inclusive. */
  addIntCol(
    name: string,
    minVal: number,
    maxVal: number,
    nulls?: NullOptions
  ): this {
    return this.add({
      kind: 'int',
      name,
      minVal,
      maxVal,
      ...withNullDefaults(nulls),
    });
  }

  /** Float column, uniform over [minVal, maxVal]. */
  addFloatCol(
    name: string,
    minVal: number,
    maxVal: number,
    nulls?: NullOptions
  ): this {
    return this.add({
      kind: 'float',
      name,
      minVal,
      maxVal,
      ...withNullDefaults(nulls),
    });
  }

  /** Categorical column, uniform choice among `categories`. */
  addCatCol(
    name: string,
    categories: readonly string[],
    nulls?: NullOptions
  ): this {
    return this.add({
      kind: 'categorical',
      name,
      categories: [...categories],
      ...withNullDefaults(nulls),
    });
  }

  /**
   * Datetime column, uniform at second resolution over [minDate, maxDate].
   * Strings are read as UTC (`2023-01-31` is midnight UTC).
   */
  addDatetimeCol(
    name: string,
    minDate: DateInput,
    maxDate: DateInput,
    nulls?: NullOptions
  ): this {
    return this.add({
      kind: 'datetime',
      name,
      minDate,
      maxDate,
      ...withNullDefaults(nulls),
    });
  }

  get columns(): readonly ColumnSpec[] {
    return [...this.specs];
  }

  get size(): number {
    return this.specs.length;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Generate a column-major table with `rows` rows.
   * Throws StateError when no column has been declared.
   */
  generate(rows: number, options?: GenerateOptions): GeneratedTable {
    return generateTable(this.specs, rows, mergeOptions(this.defaults, options));
  }

  /**
   * Generate `rows` rows and return them as an Apache Arrow Table.
   */
  generateDataframe(rows: number, options?: GenerateOptions): Table {
    const merged = mergeOptions(this.defaults, options);
    const resolved = resolveOptions(merged);
    return toArrowTable(generateTable(this.specs, rows, merged), resolved.arrow);
  }

  private add(declaration: ColumnDeclaration): this {
    const spec = unwrapOrThrow(
      validateColumnDeclaration(declaration, this.names)
    );
    this.specs.push(spec);
    this.names.add(spec.name);
    return this;
  }
}

/**
 * Create an empty schema builder.
 */
export function newSchema(defaults?: GenerateOptions): SchemaBuilder {
  return new SchemaBuilder(defaults);
}
