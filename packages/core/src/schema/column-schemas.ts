/**
 * JSON Schemas for column declarations, compiled once by the column validator.
 * Cross-field rules (min <= max, unique names) are checked after these pass.
 */

import type { ColumnKind } from '../types/column.js';

type JsonSchema = Record<string, unknown>;

const NULL_PROPERTIES = {
  allowNone: { type: 'boolean' },
  noneProbability: { type: 'integer', minimum: 0, maximum: 100 },
} as const;

const NAME_PROPERTY = {
  name: { type: 'string', minLength: 1, pattern: '\\S' },
} as const;

export const COLUMN_DECLARATION_SCHEMAS: Record<ColumnKind, JsonSchema> = {
  int: {
    $id: 'rowforge/column/int',
    type: 'object',
    required: ['name', 'minVal', 'maxVal', 'allowNone', 'noneProbability'],
    properties: {
      ...NAME_PROPERTY,
      minVal: {
        type: 'integer',
        minimum: Number.MIN_SAFE_INTEGER,
        maximum: Number.MAX_SAFE_INTEGER,
      },
      maxVal: {
        type: 'integer',
        minimum: Number.MIN_SAFE_INTEGER,
        maximum: Number.MAX_SAFE_INTEGER,
      },
      ...NULL_PROPERTIES,
    },
  },
  float: {
    $id: 'rowforge/column/float',
    type: 'object',
    required: ['name', 'minVal', 'maxVal', 'allowNone', 'noneProbability'],
    properties: {
      ...NAME_PROPERTY,
      minVal: { type: 'number' },
      maxVal: { type: 'number' },
      ...NULL_PROPERTIES,
    },
  },
  categorical: {
    $id: 'rowforge/column/categorical',
    type: 'object',
    required: ['name', 'categories', 'allowNone', 'noneProbability'],
    properties: {
      ...NAME_PROPERTY,
      categories: {
        type: 'array',
        minItems: 1,
        uniqueItems: true,
        items: { type: 'string' },
      },
      ...NULL_PROPERTIES,
    },
  },
  // Date bounds are parsed by dates.ts; Ajv cannot type Date instances, so
  // the schema only requires their presence.
  datetime: {
    $id: 'rowforge/column/datetime',
    type: 'object',
    required: ['name', 'minDate', 'maxDate', 'allowNone', 'noneProbability'],
    properties: {
      ...NAME_PROPERTY,
      minDate: {},
      maxDate: {},
      ...NULL_PROPERTIES,
    },
  },
};
