/**
 * CSV Connector
 * Reads long-format CSV files; numeric cells are cast to numbers
 */

import { parse } from 'csv-parse/sync';
import type { Record } from '@longflag/core';
import { ConnectorError, isForbiddenKey } from '@longflag/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
}

function toRows(parsed: unknown): unknown[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((row): row is unknown[] => Array.isArray(row));
}

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async loadRecords(): Promise<Record[]> {
    return this.parseContent(await this.readText());
  }

  parseContent(content: string): Record[] {
    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: false, // rows first, headers are mapped below
        bom: true,
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: this.config.skipEmptyLines !== false,
        trim: true,
        cast: true,
        cast_date: false,
      });
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
        sourceId: this.config.id,
        suggestion: 'Check the delimiter and quoting of the file.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = toRows(parsed);
    const [headerRow, ...bodyRows] = rows;
    if (!headerRow) return [];

    const hasHeaders = this.config.headers !== false;
    const headers = hasHeaders
      ? headerRow.map((h) => String(h ?? ''))
      : Array.from(
          { length: Math.max(...rows.map((r) => r.length)) },
          (_, i) => `Column${i + 1}`
        );

    for (const header of headers) {
      if (isForbiddenKey(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${header}`,
          sourceId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    const dataRows = hasHeaders ? bodyRows : rows;
    return dataRows.map((row) => {
      const record: Record = Object.create(null);
      headers.forEach((key, i) => {
        record[key] = row[i];
      });
      return record;
    });
  }
}

export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
