import { ErrorCode } from '../errors/codes.js';
import type { DateInput } from '../types/column.js';
import { ValidationError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z?$/;

/**
 * Parse a datetime bound into a UTC Date truncated to whole seconds.
 *
 * Strings are `YYYY-MM-DD` or `YYYY-MM-DDTHH:mm:ss[Z]`, always read as UTC.
 * Calendar-invalid strings such as `2023-02-30` are rejected rather than rolled over.
 */
export function parseDateInput(
  input: DateInput,
  column: string,
  field: string
): Result<Date, ValidationError> {
  if (input instanceof Date) {
    const time = input.getTime();
    if (Number.isNaN(time)) {
      return err(invalidDate(column, field, input, 'Date object is invalid'));
    }
    return ok(new Date(Math.floor(time / 1000) * 1000));
  }

  if (typeof input !== 'string') {
    return err(
      invalidDate(column, field, input, 'expected a date string or Date')
    );
  }

  const match = DATETIME_RE.exec(input) ?? DATE_RE.exec(input);
  if (!match) {
    return err(
      invalidDate(
        column,
        field,
        input,
        `"${input}" is not in YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss format`
      )
    );
  }

  const [year, month, day, hours = 0, minutes = 0, seconds = 0] = match
    .slice(1)
    .filter((part): part is string => part !== undefined)
    .map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return err(invalidDate(column, field, input, 'missing date components'));
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hours &&
    date.getUTCMinutes() === minutes &&
    date.getUTCSeconds() === seconds;
  if (!roundTrips) {
    return err(
      invalidDate(column, field, input, `"${input}" is not a calendar date`)
    );
  }
  return ok(date);
}

function invalidDate(
  column: string,
  field: string,
  value: unknown,
  reason: string
): ValidationError {
  return new ValidationError({
    message: `Invalid ${field} for column "${column}": ${reason}`,
    errorCode: ErrorCode.INVALID_DATE,
    context: {
      column,
      field,
      value,
      suggestion: 'Use an ISO-8601 date such as 2023-01-31',
    },
  });
}
