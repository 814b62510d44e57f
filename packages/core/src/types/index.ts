export type { Record, ReadResult } from './record.js';
export type { FieldType, FieldDefinition, Schema } from './schema.js';
