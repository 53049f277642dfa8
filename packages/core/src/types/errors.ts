/**
 * Error hierarchy for rowforge
 * Structured errors with stable codes, context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Context attached to an error. `column` names the declaration being
 * processed, `field` the offending parameter within it.
 */
export interface ErrorContext {
  column?: string;
  field?: string;
  value?: unknown;
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface ErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all rowforge errors
 */
export abstract class RowforgeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and the raw offending value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#withoutValue(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  get suggestion(): string | undefined {
    return this.context?.suggestion;
  }

  #withoutValue(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Malformed column declarations and generation inputs.
 * Raised before the builder state changes, so callers can fix the call and retry.
 */
export class ValidationError extends RowforgeError {
  constructor(params: Omit<ErrorParams, 'errorCode'> & { errorCode?: ErrorCode }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_COLUMN_SPEC,
    });
  }

  get column(): string | undefined {
    return this.context?.column;
  }

  get field(): string | undefined {
    return this.context?.field;
  }
}

/**
 * Operation not allowed in the builder's current state (e.g. generating from an empty schema)
 */
export class StateError extends RowforgeError {
  constructor(params: Omit<ErrorParams, 'errorCode'> & { errorCode?: ErrorCode }) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.EMPTY_SCHEMA });
  }
}

/**
 * Invalid generation options
 */
export class ConfigurationError extends RowforgeError {
  constructor(
    params: Omit<ErrorParams, 'errorCode'> & { errorCode?: ErrorCode }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.field;
  }
}

/**
 * Wraps failures that do not originate from rowforge itself
 */
export class InternalError extends RowforgeError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isRowforgeError(error: unknown): error is RowforgeError {
  return error instanceof RowforgeError;
}
