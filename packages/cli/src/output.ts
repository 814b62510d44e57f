/**
 * Renders a change report for stdout
 */

import { stringify } from 'csv-stringify/sync';
import {
  OUTPUT_COLUMNS,
  formatChangeReport,
  toOutputTable,
  type ChangeReport,
} from '@longflag/evaluator';
import type { OutputFormat } from './config.js';

/** Spreadsheet-style cells: TRUE/FALSE for flags, NA for undefined values */
export function toCsvCell(value: unknown): string {
  if (value === null || value === undefined) return 'NA';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'number') return Number.isNaN(value) ? 'NA' : String(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** bigint subjects have no JSON form; write them as strings */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function renderReport(report: ChangeReport, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return `${formatChangeReport(report)}\n`;

    case 'json':
      // NaN serializes as null, dates as ISO 8601
      return `${JSON.stringify(toOutputTable(report.rows), jsonReplacer, 2)}\n`;

    case 'csv': {
      const columns = [...OUTPUT_COLUMNS[report.method]];
      const cells = toOutputTable(report.rows).map((row) =>
        columns.map((column) => toCsvCell(row[column]))
      );
      return stringify([columns, ...cells]);
    }

    default: {
      const exhaustive: never = format;
      throw new Error(`Unsupported output format: ${String(exhaustive)}`);
    }
  }
}
