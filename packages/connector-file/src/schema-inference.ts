/**
 * Column inference for long-format tables
 *
 * Reads each column the way the evaluator will: cells that are blank or hold
 * a missing-value token do not count, numeric text counts as a number.
 */

import type { FieldDefinition, FieldType, Record, Schema } from '@longflag/core';
import { extractFieldNames } from '@longflag/core';

const MISSING_CELLS = new Set(['', 'NA', 'NaN']);
const INTEGER_TEXT = /^[-+]?\d+$/;
const DECIMAL_TEXT = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set(['integer', 'number']);
const TEMPORAL_TYPES: ReadonlySet<FieldType> = new Set(['date', 'datetime']);

export function isMissingCell(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && MISSING_CELLS.has(value.trim());
}

function textType(text: string): FieldType {
  const trimmed = text.trim();
  if (INTEGER_TEXT.test(trimmed)) return 'integer';
  if (DECIMAL_TEXT.test(trimmed)) return 'number';
  if (ISO_DATE.test(trimmed)) return 'date';
  if (ISO_DATETIME.test(trimmed)) return 'datetime';
  return 'string';
}

/** Type of a single present cell */
export function cellType(value: unknown): FieldType {
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'bigint':
      return 'integer';
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'number';
    case 'string':
      return textType(value);
    case 'object':
      if (value instanceof Date) return 'datetime';
      return Array.isArray(value) ? 'array' : 'object';
    default:
      return 'string';
  }
}

function allIn(types: ReadonlySet<FieldType>, allowed: ReadonlySet<FieldType>): boolean {
  return [...types].every((type) => allowed.has(type));
}

/**
 * One type for a column. Integers widen to numbers and dates to datetimes;
 * any other mix reads as text.
 */
export function mergeCellTypes(types: ReadonlySet<FieldType>): FieldType {
  if (types.size === 0) return 'string';
  if (allIn(types, NUMERIC_TYPES)) return types.has('number') ? 'number' : 'integer';
  if (allIn(types, TEMPORAL_TYPES)) return types.has('datetime') ? 'datetime' : 'date';
  if (types.size === 1) return [...types][0] ?? 'string';
  return 'string';
}

/**
 * Infer the columns of a table. Columns keep the order in which they are
 * first seen; a column is required when no row leaves it missing.
 */
export function inferSchemaFromRecords(
  name: string,
  records: readonly Record[],
  description?: string
): Schema {
  const fields = extractFieldNames(records).map((fieldName): FieldDefinition => {
    const present = records
      .map((record) => record[fieldName])
      .filter((value) => !isMissingCell(value));

    return {
      name: fieldName,
      type: mergeCellTypes(new Set(present.map(cellType))),
      required: present.length === records.length,
      example: present[0],
    };
  });

  return { name, description, fields, inferred: true };
}
