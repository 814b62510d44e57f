import { describe, expect, it, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import ExcelJS from 'exceljs';
import { ConnectorError } from '@longflag/core';
import type { FieldType } from '@longflag/core';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
  cellType,
  inferSchemaFromRecords,
  isMissingCell,
  mergeCellTypes,
} from '../src/index.js';

let tmpDir = '';

function tempFile(name: string, content?: string): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
  const filePath = join(tmpDir, name);
  if (content !== undefined) {
    writeFileSync(filePath, content, 'utf-8');
  }
  return filePath;
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('CsvConnector', () => {
  it('reads long-format rows and casts numbers', async () => {
    const filePath = tempFile('scores.csv', 'Person,Time,Score\n1,1,10\n1,2,12.5\nP2, 1 ,NA\n');
    const connector = createCsvConnector({ id: 'csv', name: 'scores', filePath });

    await connector.connect();
    const result = await connector.readRecords();

    expect(connector.state).toBe('connected');
    expect(result.totalCount).toBe(3);
    expect(result.records).toEqual([
      { Person: 1, Time: 1, Score: 10 },
      { Person: 1, Time: 2, Score: 12.5 },
      { Person: 'P2', Time: 1, Score: 'NA' },
    ]);
  });

  it('handles empty CSV files', async () => {
    const filePath = tempFile('empty.csv', '');
    const connector = createCsvConnector({ id: 'csv-empty', name: 'empty', filePath });

    await connector.connect();
    const result = await connector.readRecords();

    expect(result.records).toHaveLength(0);
    const schema = await connector.getSchema();
    expect(schema.fields).toHaveLength(0);
  });

  it('strips a byte order mark and honours the delimiter', async () => {
    const filePath = tempFile('semicolon.csv', '\uFEFFid;week;weight\na;1;70\n');
    const connector = createCsvConnector({ id: 'csv', name: 'semicolon', filePath, delimiter: ';' });

    await connector.connect();
    const { records } = await connector.readRecords();

    expect(records).toEqual([{ id: 'a', week: 1, weight: 70 }]);
  });

  it('names columns when the file has no header row', async () => {
    const filePath = tempFile('plain.csv', 'a,1,70\nb,1,80\n');
    const connector = createCsvConnector({ id: 'csv', name: 'plain', filePath, headers: false });

    await connector.connect();
    const { records } = await connector.readRecords();

    expect(records).toEqual([
      { Column1: 'a', Column2: 1, Column3: 70 },
      { Column1: 'b', Column2: 1, Column3: 80 },
    ]);
  });

  it('rejects unsafe header names', async () => {
    const filePath = tempFile('unsafe.csv', 'id,__proto__\n1,2\n');
    const connector = createCsvConnector({ id: 'csv', name: 'unsafe', filePath });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'Unsafe CSV header name: __proto__',
    });
    expect(connector.state).toBe('error');
  });

  it('infers a schema from the loaded rows', async () => {
    const filePath = tempFile('scores.csv', 'Person,Time,Score\na,1,10\nb,2,\nc,3,1.5\n');
    const connector = createCsvConnector({ id: 'csv', name: 'scores', filePath });

    await connector.connect();
    const schema = await connector.getSchema();

    expect(schema.inferred).toBe(true);
    expect(schema.fields).toEqual([
      { name: 'Person', type: 'string', required: true, example: 'a' },
      { name: 'Time', type: 'integer', required: true, example: 1 },
      { name: 'Score', type: 'number', required: false, example: 10 },
    ]);
  });
});

describe('JsonConnector', () => {
  it('reads the array at recordsPath', async () => {
    const filePath = tempFile(
      'nested.json',
      JSON.stringify({ data: { items: [{ id: 1, visit: 1, nested: { a: 1, b: 'x' } }] } })
    );
    const connector = createJsonConnector({
      id: 'json',
      name: 'nested',
      filePath,
      recordsPath: 'data.items',
    });

    await connector.connect();
    const result = await connector.readRecords();

    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.nested).toEqual({ a: 1, b: 'x' });
  });

  it('requires an array at the root without recordsPath', async () => {
    const filePath = tempFile('object.json', JSON.stringify({ id: 1 }));
    const connector = createJsonConnector({ id: 'json', name: 'object', filePath });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'JSON file does not contain an array at root level',
    });
  });

  it('requires every element to be an object', async () => {
    const filePath = tempFile('mixed.json', JSON.stringify([{ id: 1 }, 2]));
    const connector = createJsonConnector({ id: 'json', name: 'mixed', filePath });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'Element 1 of the records array is not an object',
    });
  });

  it('reports invalid JSON', async () => {
    const filePath = tempFile('broken.json', '[{"id": 1,');
    const connector = createJsonConnector({ id: 'json', name: 'broken', filePath });

    const error = await connector.connect().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ code: 'SCHEMA_MISMATCH' });
  });

  it('rejects unsafe recordsPath segments', async () => {
    const filePath = tempFile('unsafe-path.json', JSON.stringify({ data: { items: [] } }));
    const connector = createJsonConnector({
      id: 'json-unsafe-path',
      name: 'unsafe-path',
      filePath,
      recordsPath: '__proto__.polluted',
    });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'CONFIGURATION_ERROR',
    });
  });
});

describe('ExcelConnector', () => {
  it('unwraps formulas, rich text and hyperlinks and keeps dates', async () => {
    const filePath = tempFile('visits.xlsx');
    const wb = new ExcelJS.Workbook();
    const sheet = wb.addWorksheet('Visits');
    sheet.addRow(['id', 'visit', 'weight', 'site']);
    sheet.addRow([
      { richText: [{ text: 'pa' }, { text: 'tient' }] },
      new Date(Date.UTC(2024, 0, 15)),
      { formula: '35*2', result: 70 },
      { text: 'north', hyperlink: 'https://example.com/north' },
    ]);
    await wb.xlsx.writeFile(filePath);

    const connector = createExcelConnector({ id: 'xlsx', name: 'visits', filePath, sheet: 'Visits' });
    await connector.connect();
    const { records } = await connector.readRecords();

    expect(records).toHaveLength(1);
    expect(records[0]?.id).toBe('patient');
    expect(records[0]?.visit).toEqual(new Date(Date.UTC(2024, 0, 15)));
    expect(records[0]?.weight).toBe(70);
    expect(records[0]?.site).toBe('north');
  });

  it('reads Excel files with merged header cells', async () => {
    const filePath = tempFile('merged.xlsx');
    const wb = new ExcelJS.Workbook();
    const sheet = wb.addWorksheet('Sheet1');
    sheet.mergeCells('B1:C1');
    sheet.getCell('A1').value = 'name';
    sheet.getCell('B1').value = 'amount';
    sheet.getCell('A2').value = 'Alice';
    sheet.getCell('B2').value = 10;
    await wb.xlsx.writeFile(filePath);

    const connector = createExcelConnector({ id: 'excel-merged', name: 'merged', filePath });
    await connector.connect();
    const result = await connector.readRecords();

    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.name).toBe('Alice');
    expect(result.records[0]?.amount).toBe(10);
  });

  it('fails with NOT_FOUND for a missing sheet', async () => {
    const filePath = tempFile('one-sheet.xlsx');
    const wb = new ExcelJS.Workbook();
    wb.addWorksheet('Only').addRow(['id']);
    await wb.xlsx.writeFile(filePath);

    const connector = createExcelConnector({ id: 'xlsx', name: 'one', filePath, sheet: 'Other' });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'Sheet not found: Other',
    });
  });
});

describe('BaseFileConnector', () => {
  it('wraps parser failures as READ_FAILED', async () => {
    const filePath = tempFile('not-a-workbook.xlsx', 'id,t,v\n');
    const connector = createExcelConnector({ id: 'xlsx', name: 'broken', filePath });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'READ_FAILED',
      sourceId: 'xlsx',
      location: filePath,
    });
    expect(connector.state).toBe('error');
  });

  it('fails with NOT_FOUND for a missing file', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
    const connector = createCsvConnector({
      id: 'csv',
      name: 'missing',
      filePath: join(tmpDir, 'missing.csv'),
    });

    await expect(connector.testConnection()).resolves.toBe(false);
    await expect(connector.connect()).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: `File not found: ${join(tmpDir, 'missing.csv')}`,
    });
  });

  it('refuses to read before connect and after disconnect', async () => {
    const filePath = tempFile('scores.csv', 'id,t,v\na,1,1\n');
    const connector = createCsvConnector({ id: 'csv', name: 'scores', filePath });

    await expect(connector.readRecords()).rejects.toMatchObject({
      code: 'NOT_CONNECTED',
      message: "Source 'csv' is not connected (state: disconnected)",
    });

    await connector.connect();
    await expect(connector.testConnection()).resolves.toBe(true);
    await connector.disconnect();

    expect(connector.state).toBe('disconnected');
    await expect(connector.getSchema()).rejects.toBeInstanceOf(ConnectorError);
  });

  it('hands out a copy of the cached rows', async () => {
    const filePath = tempFile('scores.csv', 'id,t,v\na,1,1\nb,1,2\n');
    const connector = createCsvConnector({ id: 'csv', name: 'scores', filePath });
    await connector.connect();

    const first = await connector.readRecords();
    first.records.reverse();
    const second = await connector.readRecords();

    expect(second.records.map((r) => r.id)).toEqual(['a', 'b']);
  });
});

describe('inferSchemaFromRecords', () => {
  it('reads integer and number values in one column as number', () => {
    const schema = inferSchemaFromRecords('t', [{ v: 1 }, { v: 2 }, { v: 2.5 }]);

    expect(schema.fields).toEqual([{ name: 'v', type: 'number', required: true, example: 1 }]);
  });

  it('skips missing-value tokens and reads numeric text as numbers', () => {
    const schema = inferSchemaFromRecords('visits', [
      { id: 'a', visit: '1', weight: 'NA' },
      { id: 'b', visit: ' 2 ', weight: '70.5' },
      { id: 'c', weight: '1e2' },
    ]);

    expect(schema).toEqual({
      name: 'visits',
      description: undefined,
      inferred: true,
      fields: [
        { name: 'id', type: 'string', required: true, example: 'a' },
        { name: 'visit', type: 'integer', required: false, example: '1' },
        { name: 'weight', type: 'number', required: false, example: '70.5' },
      ],
    });
  });

  it('reads a column of mixed kinds as text', () => {
    const schema = inferSchemaFromRecords('t', [{ t: 1 }, { t: 'week two' }]);

    expect(schema.fields[0]?.type).toBe('string');
  });
});

describe('cellType and mergeCellTypes', () => {
  it('types single cells', () => {
    expect(cellType(3)).toBe('integer');
    expect(cellType(3.5)).toBe('number');
    expect(cellType(4n)).toBe('integer');
    expect(cellType(true)).toBe('boolean');
    expect(cellType(new Date(0))).toBe('datetime');
    expect(cellType('2024-01-15')).toBe('date');
    expect(cellType('2024-01-15T08:30:00Z')).toBe('datetime');
    expect(cellType('-.5')).toBe('number');
    expect(cellType([1])).toBe('array');
    expect(cellType({ a: 1 })).toBe('object');
  });

  it('treats blanks and missing-value tokens as missing', () => {
    expect([null, undefined, '', ' ', 'NA', ' NaN '].every(isMissingCell)).toBe(true);
    expect([0, 'na', 'N/A', false].some(isMissingCell)).toBe(false);
  });

  it('widens compatible kinds', () => {
    expect(mergeCellTypes(new Set<FieldType>())).toBe('string');
    expect(mergeCellTypes(new Set<FieldType>(['integer']))).toBe('integer');
    expect(mergeCellTypes(new Set<FieldType>(['date', 'datetime']))).toBe('datetime');
    expect(mergeCellTypes(new Set<FieldType>(['integer', 'boolean']))).toBe('string');
  });
});
