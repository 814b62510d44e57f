/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/** Keys that must never become record fields (prototype pollution) */
export const FORBIDDEN_RECORD_KEYS: ReadonlySet<string> = new Set([
  '__proto__',
  'prototype',
  'constructor',
]);

export function isForbiddenKey(key: string): boolean {
  return FORBIDDEN_RECORD_KEYS.has(key);
}

/**
 * Extract all unique field names from an array of records, in first-seen order
 */
export function extractFieldNames(records: readonly Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Whether the record owns the field. Works for null-prototype records.
 */
export function hasField(record: Record, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}
