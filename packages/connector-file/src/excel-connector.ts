/**
 * Excel Connector
 * Reads .xlsx worksheets into records, one per non-empty row
 */

import ExcelJS from 'exceljs';
import type { Record } from '@longflag/core';
import { ConnectorError, isForbiddenKey } from '@longflag/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Starting row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

/**
 * Unwrap formula results, rich text and hyperlinks. Dates stay Date so
 * they can be used as timepoints.
 */
function normalizeCellValue(value: ExcelJS.CellValue): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date || typeof value !== 'object') {
    return value;
  }

  if ('result' in value) {
    return normalizeCellValue(value.result);
  }

  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  if ('hyperlink' in value) {
    return value.text;
  }

  if ('error' in value) {
    return value.error;
  }

  return null;
}

function columnName(colNumber: number): string {
  let name = '';
  let n = colNumber;

  while (n > 0) {
    const remainder = (n - 1) % 26;
    name = String.fromCharCode(65 + remainder) + name;
    n = Math.floor((n - 1) / 26);
  }

  return name;
}

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async loadRecords(): Promise<Record[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet =
      this.config.sheet === undefined
        ? workbook.worksheets[0]
        : workbook.getWorksheet(this.config.sheet);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        sourceId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    return this.readSheet(sheet);
  }

  private readSheet(sheet: ExcelJS.Worksheet): Record[] {
    const startRow = this.config.startRow ?? 1;
    const startColumn = this.config.startColumn ?? 1;
    const hasHeaders = this.config.headers !== false;

    // column number -> field name
    const headers = new Map<number, string>();
    if (hasHeaders) {
      sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
        if (colNumber < startColumn) return;
        // A merged header repeats the master value; keep only the master column
        if (cell.isMerged && cell.master.address !== cell.address) return;
        const header = String(normalizeCellValue(cell.value) ?? columnName(colNumber));
        if (isForbiddenKey(header)) {
          throw new ConnectorError({
            code: 'SCHEMA_MISMATCH',
            message: `Unsafe Excel header name: ${header}`,
            sourceId: this.config.id,
            suggestion: 'Rename the column to a safe field name and try again.',
          });
        }
        headers.set(colNumber, header);
      });
    } else {
      for (let col = startColumn; col <= sheet.columnCount; col++) {
        headers.set(col, columnName(col));
      }
    }

    const records: Record[] = [];
    const dataStartRow = hasHeaders ? startRow + 1 : startRow;

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber < dataStartRow) return;

      const record: Record = Object.create(null);
      let hasData = false;

      for (const [colNumber, header] of headers) {
        const value = normalizeCellValue(row.getCell(colNumber).value);
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      }

      if (hasData) {
        records.push(record);
      }
    });

    return records;
  }
}

export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
