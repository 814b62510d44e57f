/**
 * Schema types describing the columns of a table
 */

export type FieldType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'array'
  | 'object';

export interface FieldDefinition {
  name: string;
  type: FieldType;
  /** Present with a non-empty value in every row */
  required: boolean;
  /** First non-empty value seen */
  example?: unknown;
}

export interface Schema {
  name: string;
  description?: string;
  fields: FieldDefinition[];
  /** Whether the schema was inferred from the rows */
  inferred: boolean;
}
