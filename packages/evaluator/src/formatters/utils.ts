/**
 * Formatter Utilities
 */

import type {
  ChangeRow,
  FirstLastRow,
  SubjectId,
  TimepointChangeRow,
} from '../types/index.js';

export function isFirstLastRow(row: ChangeRow): row is FirstLastRow {
  return 'firstValue' in row;
}

export function isTimepointRow(row: ChangeRow): row is TimepointChangeRow {
  return 'fromTime' in row;
}

/**
 * Up to four decimals; undefined values print as NA
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NA';
  if (Number.isInteger(value)) return String(value);
  return String(Math.round(value * 10_000) / 10_000);
}

/** Dates print as ISO 8601, other subjects as themselves */
export function formatSubject(subject: SubjectId): string {
  return subject instanceof Date ? subject.toISOString() : String(subject);
}

/**
 * One-line description of a change row
 */
export function describeRow(row: ChangeRow): string {
  const subject = formatSubject(row.subject);
  const change = formatNumber(row.change);

  if (isFirstLastRow(row)) {
    return `${subject}: change ${change} (first ${formatNumber(row.firstValue)}, last ${formatNumber(row.lastValue)})`;
  }

  if (isTimepointRow(row)) {
    return `${subject}: ${formatNumber(row.fromTime)} -> ${formatNumber(row.toTime)}, change ${change}`;
  }

  return `${subject}: mean change ${change}`;
}
