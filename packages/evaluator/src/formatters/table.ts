/**
 * Tabular output
 *
 * Converts change rows to plain records with the conventional column names
 * (ID, first_value, last_value, from_time, to_time, change, flagged).
 */

import type { Record as DataRecord } from '@longflag/core';
import type { ChangeMethod, ChangeRow } from '../types/index.js';
import { isFirstLastRow, isTimepointRow } from './utils.js';

export const OUTPUT_COLUMNS: { readonly [M in ChangeMethod]: readonly string[] } = {
  first_last: ['ID', 'first_value', 'last_value', 'change', 'flagged'],
  mean_change: ['ID', 'change', 'flagged'],
  all_timepoints: ['ID', 'from_time', 'to_time', 'change', 'flagged'],
};

export function toOutputRow(row: ChangeRow): DataRecord {
  if (isFirstLastRow(row)) {
    return {
      ID: row.subject,
      first_value: row.firstValue,
      last_value: row.lastValue,
      change: row.change,
      flagged: row.flagged,
    };
  }

  if (isTimepointRow(row)) {
    return {
      ID: row.subject,
      from_time: row.fromTime,
      to_time: row.toTime,
      change: row.change,
      flagged: row.flagged,
    };
  }

  return { ID: row.subject, change: row.change, flagged: row.flagged };
}

export function toOutputTable(rows: readonly ChangeRow[]): DataRecord[] {
  return rows.map(toOutputRow);
}
