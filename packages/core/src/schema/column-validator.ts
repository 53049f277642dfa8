import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import type {
  ColumnKind,
  ColumnSpec,
  DateInput,
  NullOptions,
} from '../types/column.js';
import { ValidationError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { COLUMN_DECLARATION_SCHEMAS } from './column-schemas.js';
import { parseDateInput } from './dates.js';

/**
 * Raw, unvalidated column declaration as received from the builder API.
 * Values are `unknown` because JavaScript callers can pass anything.
 */
export type ColumnDeclaration =
  | ({ kind: 'int'; name: unknown; minVal: unknown; maxVal: unknown } & RawNulls)
  | ({ kind: 'float'; name: unknown; minVal: unknown; maxVal: unknown } & RawNulls)
  | ({ kind: 'categorical'; name: unknown; categories: unknown } & RawNulls)
  | ({
      kind: 'datetime';
      name: unknown;
      minDate: DateInput;
      maxDate: DateInput;
    } & RawNulls);

interface RawNulls {
  allowNone: unknown;
  noneProbability: unknown;
}

let ajvInstance: Ajv | undefined;
const validators = new Map<ColumnKind, ValidateFunction>();

function getValidator(kind: ColumnKind): ValidateFunction {
  const cached = validators.get(kind);
  if (cached) return cached;
  ajvInstance ??= new Ajv({
    allErrors: true,
    strict: true,
    strictNumbers: true,
    verbose: true,
  });
  const compiled = ajvInstance.compile(COLUMN_DECLARATION_SCHEMAS[kind]);
  validators.set(kind, compiled);
  return compiled;
}

/**
 * Apply the null-injection defaults (`allowNone=false`, `noneProbability=0`).
 */
export function withNullDefaults(nulls: NullOptions = {}): RawNulls {
  return {
    allowNone: nulls.allowNone ?? false,
    noneProbability: nulls.noneProbability ?? 0,
  };
}

/**
 * Validate a declaration against its JSON Schema, the names already in the
 * schema, and the cross-field rules. Returns a frozen ColumnSpec on success.
 */
export function validateColumnDeclaration(
  declaration: ColumnDeclaration,
  existingNames: ReadonlySet<string>
): Result<ColumnSpec, ValidationError> {
  const label =
    typeof declaration.name === 'string' ? declaration.name : '<unnamed>';

  const validate = getValidator(declaration.kind);
  if (!validate(declaration)) {
    return err(fromAjvErrors(label, validate.errors ?? []));
  }

  // The schema pass guarantees these shapes.
  const name = String(declaration.name);
  const allowNone = declaration.allowNone === true;
  const noneProbability = Number(declaration.noneProbability);

  if (existingNames.has(name)) {
    return err(
      new ValidationError({
        message: `Column "${name}" is already defined`,
        errorCode: ErrorCode.DUPLICATE_COLUMN,
        context: {
          column: name,
          field: 'name',
          suggestion: 'Column names must be unique within a schema',
        },
      })
    );
  }

  switch (declaration.kind) {
    case 'int':
    case 'float': {
      const minVal = Number(declaration.minVal);
      const maxVal = Number(declaration.maxVal);
      if (minVal > maxVal) {
        return err(invertedBounds(name, minVal, maxVal));
      }
      if (!Number.isFinite(maxVal - minVal)) {
        return err(
          new ValidationError({
            message: `Range of column "${name}" is too wide to sample`,
            errorCode: ErrorCode.INVALID_COLUMN_SPEC,
            context: { column: name, field: 'maxVal', value: maxVal },
          })
        );
      }
      const spec: ColumnSpec = {
        kind: declaration.kind,
        name,
        minVal,
        maxVal,
        allowNone,
        noneProbability,
      };
      return ok(Object.freeze(spec));
    }
    case 'categorical': {
      const categories = Array.isArray(declaration.categories)
        ? declaration.categories.map(String)
        : [];
      return ok(
        Object.freeze({
          kind: 'categorical',
          name,
          categories: Object.freeze(categories),
          allowNone,
          noneProbability,
        })
      );
    }
    case 'datetime': {
      const min = parseDateInput(declaration.minDate, name, 'minDate');
      if (min._tag === 'Err') return min;
      const max = parseDateInput(declaration.maxDate, name, 'maxDate');
      if (max._tag === 'Err') return max;
      if (min.value.getTime() > max.value.getTime()) {
        return err(
          invertedBounds(name, min.value.toISOString(), max.value.toISOString())
        );
      }
      return ok(
        Object.freeze({
          kind: 'datetime',
          name,
          minDate: min.value,
          maxDate: max.value,
          allowNone,
          noneProbability,
        })
      );
    }
  }
}

function invertedBounds(
  column: string,
  min: number | string,
  max: number | string
): ValidationError {
  return new ValidationError({
    message: `Column "${column}" has min (${min}) greater than max (${max})`,
    errorCode: ErrorCode.INVERTED_BOUNDS,
    context: {
      column,
      field: 'minVal',
      value: { min, max },
      suggestion: 'Swap the bounds so that min <= max',
    },
  });
}

function fromAjvErrors(
  column: string,
  errors: readonly ErrorObject[]
): ValidationError {
  const [first] = errors;
  const field = first ? fieldOf(first) : undefined;
  const errorCode = first ? codeFor(first, field) : ErrorCode.INVALID_COLUMN_SPEC;
  const detail = first?.message ?? 'is invalid';
  const subject = field ?? 'declaration';

  return new ValidationError({
    message: `Invalid ${subject} for column "${column}": ${detail}`,
    errorCode,
    context: {
      column,
      field,
      value: first?.data,
      errors: errors.map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()),
      suggestion: SUGGESTIONS[errorCode],
    },
  });
}

function fieldOf(error: ErrorObject): string | undefined {
  if (error.keyword === 'required') {
    const missing: unknown = error.params.missingProperty;
    return typeof missing === 'string' ? missing : undefined;
  }
  const [top] = error.instancePath.split('/').filter(Boolean);
  return top;
}

function codeFor(error: ErrorObject, field: string | undefined): ErrorCode {
  switch (field) {
    case 'name':
      return ErrorCode.INVALID_COLUMN_NAME;
    case 'noneProbability':
      return ErrorCode.INVALID_NONE_PROBABILITY;
    case 'categories':
      if (error.keyword === 'minItems') return ErrorCode.EMPTY_CATEGORIES;
      if (error.keyword === 'uniqueItems') return ErrorCode.DUPLICATE_CATEGORY;
      return ErrorCode.INVALID_COLUMN_SPEC;
    default:
      return ErrorCode.INVALID_COLUMN_SPEC;
  }
}

const SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_COLUMN_NAME]: 'Use a non-empty string as column name',
  [ErrorCode.INVALID_NONE_PROBABILITY]:
    'noneProbability is an integer percent between 0 and 100',
  [ErrorCode.EMPTY_CATEGORIES]: 'Provide at least one category',
  [ErrorCode.DUPLICATE_CATEGORY]: 'Remove repeated categories',
};
