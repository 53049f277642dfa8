/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Column declaration errors (E001–E099)
  INVALID_COLUMN_NAME = 'E001',
  DUPLICATE_COLUMN = 'E002',
  INVERTED_BOUNDS = 'E003',
  EMPTY_CATEGORIES = 'E004',
  DUPLICATE_CATEGORY = 'E005',
  INVALID_NONE_PROBABILITY = 'E006',
  INVALID_DATE = 'E007',
  INVALID_COLUMN_SPEC = 'E008',

  // Generation input errors (E100–E199)
  INVALID_ROW_COUNT = 'E100',

  // State errors (E200–E299)
  EMPTY_SCHEMA = 'E200',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.INVALID_COLUMN_NAME]: 10,
  [ErrorCode.DUPLICATE_COLUMN]: 11,
  [ErrorCode.INVERTED_BOUNDS]: 12,
  [ErrorCode.EMPTY_CATEGORIES]: 13,
  [ErrorCode.DUPLICATE_CATEGORY]: 14,
  [ErrorCode.INVALID_NONE_PROBABILITY]: 15,
  [ErrorCode.INVALID_DATE]: 16,
  [ErrorCode.INVALID_COLUMN_SPEC]: 17,
  [ErrorCode.INVALID_ROW_COUNT]: 20,
  [ErrorCode.EMPTY_SCHEMA]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
