/**
 * Evaluation Error Types
 */

export type EvaluationErrorCode =
  | 'SCHEMA_ERROR'
  | 'TYPE_COERCION_ERROR'
  | 'INVALID_METHOD'
  | 'EMPTY_INPUT'
  | 'INVALID_OPTIONS'
  | 'CONNECTOR_NOT_CONNECTED';

export interface EvaluationErrorDetails {
  code: EvaluationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

/** Printable form of an offending cell value */
function describeValue(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  if (value === null || typeof value !== 'object') return String(value);
  if (value instanceof Date) return 'an invalid date';
  return Array.isArray(value) ? 'an array' : 'an object';
}

export class EvaluationError extends Error {
  readonly code: EvaluationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: EvaluationErrorDetails) {
    super(details.message);
    this.name = 'EvaluationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

const FIELD_NAMES_SUGGESTION =
  'Check the subject, time and value field names against the columns of the table.';

/** A named field is absent from a row */
export class SchemaError extends EvaluationError {
  readonly field: string;
  readonly rowIndex: number;

  constructor(field: string, rowIndex: number) {
    super({
      code: 'SCHEMA_ERROR',
      message: `Field '${field}' is missing from row ${rowIndex}`,
      suggestion: FIELD_NAMES_SUGGESTION,
      context: { field, rowIndex },
    });
    this.name = 'SchemaError';
    this.field = field;
    this.rowIndex = rowIndex;
  }
}

/** A named field is not a column of the source at all */
export class MissingColumnError extends EvaluationError {
  readonly field: string;
  readonly columns: readonly string[];

  constructor(field: string, source: string, columns: readonly string[]) {
    super({
      code: 'SCHEMA_ERROR',
      message: `Field '${field}' is not a column of ${source} (columns: ${columns.join(', ')})`,
      suggestion: FIELD_NAMES_SUGGESTION,
      context: { field, source, columns: [...columns] },
    });
    this.name = 'MissingColumnError';
    this.field = field;
    this.columns = columns;
  }
}

/** A time or value cell is not numeric, or a subject is not a usable key */
export class TypeCoercionError extends EvaluationError {
  readonly field: string;
  readonly rowIndex: number;
  readonly value: unknown;

  constructor(field: string, rowIndex: number, value: unknown, expected: 'number' | 'subject') {
    super({
      code: 'TYPE_COERCION_ERROR',
      message:
        expected === 'number'
          ? `Cannot interpret ${describeValue(value)} in field '${field}' of row ${rowIndex} as a number`
          : `Subject identifier ${describeValue(value)} in field '${field}' of row ${rowIndex} must be a string, number, bigint, boolean or valid date`,
      suggestion:
        expected === 'number'
          ? 'Clean the column so every cell is numeric, or leave missing cells empty.'
          : 'Give every row a subject identifier.',
      context: { field, rowIndex },
    });
    this.name = 'TypeCoercionError';
    this.field = field;
    this.rowIndex = rowIndex;
    this.value = value;
  }
}

export class InvalidMethodError extends EvaluationError {
  readonly method: unknown;

  constructor(method: unknown, allowed: readonly string[]) {
    super({
      code: 'INVALID_METHOD',
      message: `Invalid method: ${describeValue(method)}`,
      suggestion: `Use one of: ${allowed.join(', ')}.`,
      context: { method: typeof method === 'string' ? method : describeValue(method) },
    });
    this.name = 'InvalidMethodError';
    this.method = method;
  }
}

export class EmptyInputError extends EvaluationError {
  constructor() {
    super({
      code: 'EMPTY_INPUT',
      message: 'The table has no rows to evaluate',
      suggestion: 'Check the input file, or allow empty input to get an empty result.',
    });
    this.name = 'EmptyInputError';
  }
}
