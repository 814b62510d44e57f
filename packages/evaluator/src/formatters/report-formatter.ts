/**
 * Change Report Formatter
 *
 * Plain-text rendering of a change report.
 */

import type { ChangeReport, ChangeRow } from '../types/index.js';
import { describeRow, formatNumber } from './utils.js';

const MAX_LISTED_ROWS = 10;

function pushRowSection(lines: string[], title: string, rows: readonly ChangeRow[]): void {
  if (rows.length === 0) return;

  lines.push(`### ${title} (${rows.length})`);
  for (const row of rows.slice(0, MAX_LISTED_ROWS)) {
    lines.push(`- ${describeRow(row)}`);
  }
  if (rows.length > MAX_LISTED_ROWS) {
    lines.push(`... and ${rows.length - MAX_LISTED_ROWS} more`);
  }
  lines.push('');
}

/**
 * Format a change report as plain text
 */
export function formatChangeReport(report: ChangeReport): string {
  const lines: string[] = [];
  const { summary, fields } = report;

  lines.push('## Change Evaluation Report');
  lines.push(`Source: ${report.source.name} (${report.source.type})`);
  lines.push(`Method: ${report.method}`);
  lines.push(`Threshold: ${formatNumber(report.threshold)}`);
  lines.push(`Fields: subject=${fields.subject}, time=${fields.time}, value=${fields.value}`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Input Records: ${summary.inputRecordCount}`);
  lines.push(`- Subjects: ${summary.subjectCount}`);
  lines.push(`- Result Rows: ${summary.rowCount}`);
  lines.push(`- Flagged: ${summary.flaggedCount}`);
  if (summary.undeterminedCount > 0) {
    lines.push(`- Undetermined: ${summary.undeterminedCount}`);
  }
  if (summary.flaggedCount === 0) {
    lines.push('No rows flagged.');
  }
  lines.push('');

  pushRowSection(
    lines,
    'Flagged Rows',
    report.rows.filter((row) => row.flagged === true)
  );
  pushRowSection(
    lines,
    'Undetermined Rows',
    report.rows.filter((row) => row.flagged === null)
  );

  lines.push('---');
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
