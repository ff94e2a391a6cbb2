/**
 * Tabular Quote Parser
 *
 * Reads quote rows from CSV, XLSX or JSON files and maps their columns onto
 * QuoteRecord fields. Unlike PDF ingestion, failures here are thrown: a
 * tabular file is an explicit choice and should either parse or visibly fail.
 */

import path from 'path';
import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import { errorMessage, TabularParseError, UnsupportedFormatError } from '../errors';
import { logger } from '../logger';
import { tabularFilesCounter } from '../metrics';
import { createQuoteRecord } from '../quote';
import { validateTabularRows } from '../schemas';
import type { QuoteRecord } from '../types';
import { canonicalColumn } from './aliases';

export type TabularRow = Record<string, unknown>;

export type TabularFormat = 'csv' | 'xlsx' | 'json';

const FORMATS_BY_EXTENSION: Record<string, TabularFormat> = {
  '.csv': 'csv',
  '.xlsx': 'xlsx',
  '.json': 'json',
};

/**
 * Lenient number parsing: blanks and garbage fall back, thousands separators
 * are ignored.
 */
export function safeNumber(value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' && typeof value !== 'boolean') return undefined;

  const text = String(value).replace(/,/g, '').trim();
  if (text === '') return undefined;

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function safeString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Rename a row's columns to canonical field names. Unrecognized columns are
 * kept as they are.
 */
export function canonicalizeRow(row: TabularRow): TabularRow {
  const renamed: TabularRow = {};
  for (const [column, value] of Object.entries(row)) {
    renamed[canonicalColumn(column)] = value;
  }
  return renamed;
}

export function parseQuoteRows(rows: readonly TabularRow[]): QuoteRecord[] {
  return rows.map((raw, index) => {
    const row = canonicalizeRow(raw);
    return createQuoteRecord(
      {
        plan_name: safeString(row.plan_name),
        premium: safeNumber(row.premium),
        deductible: safeNumber(row.deductible),
        coinsurance: safeNumber(row.coinsurance),
        out_of_pocket_max: safeNumber(row.out_of_pocket_max),
        coverage_limit: safeNumber(row.coverage_limit),
        annual_benefit_max: safeNumber(row.annual_benefit_max),
        network_size: safeNumber(row.network_size),
      },
      index
    );
  });
}

/**
 * Plain value of an ExcelJS cell: formula results, rich text and hyperlink
 * text are unwrapped.
 */
function cellToPrimitive(value: CellValue): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'object' || value instanceof Date) return value;
  if ('result' in value) return value.result ?? null;
  if ('richText' in value) return value.richText.map((run) => run.text).join('');
  if ('text' in value) return value.text;
  return null;
}

/**
 * Header row -> column names, every later non-empty row -> one record.
 */
export function worksheetRows(worksheet: Worksheet): TabularRow[] {
  const headerRow = worksheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= worksheet.columnCount; col++) {
    headers.push(String(cellToPrimitive(headerRow.getCell(col).value) ?? '').trim());
  }

  const rows: TabularRow[] = [];
  worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: TabularRow = {};
    headers.forEach((header, i) => {
      if (header === '') return;
      record[header] = cellToPrimitive(row.getCell(i + 1).value);
    });
    if (Object.values(record).every((value) => value === null || value === '')) return;
    rows.push(record);
  });

  return rows;
}

async function readCsv(content: Buffer): Promise<TabularRow[]> {
  const workbook = new ExcelJS.Workbook();
  // Keep every cell as text; number parsing happens per field
  const worksheet = await workbook.csv.read(Readable.from([content]), {
    map: (value: unknown) => value,
  });
  return worksheetRows(worksheet);
}

async function readXlsx(content: Buffer): Promise<TabularRow[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.read(Readable.from([content]));
  const worksheet = workbook.worksheets[0];
  if (!worksheet) return [];
  return worksheetRows(worksheet);
}

function readJson(content: Buffer): TabularRow[] {
  const data: unknown = JSON.parse(content.toString('utf-8'));
  const rows = Array.isArray(data) ? data : [data];
  const validation = validateTabularRows(rows);
  if (!validation.valid) {
    throw new Error(`expected an object or an array of objects (${(validation.errors ?? []).join('; ')})`);
  }
  return rows.filter((row): row is TabularRow => typeof row === 'object' && row !== null);
}

async function readRows(format: TabularFormat, content: Buffer): Promise<TabularRow[]> {
  switch (format) {
    case 'csv':
      return readCsv(content);
    case 'xlsx':
      return readXlsx(content);
    case 'json':
      return readJson(content);
  }
}

export function detectTabularFormat(filename: string): TabularFormat {
  const extension = path.extname(filename).toLowerCase();
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(
      filename,
      extension === '.xls' ? 'legacy .xls workbooks are not read; save as .xlsx' : undefined
    );
  }
  return format;
}

/**
 * Parse quotes from a CSV, XLSX or JSON file.
 *
 * @throws UnsupportedFormatError for any other extension
 * @throws TabularParseError when the content cannot be read
 */
export async function parseTabularFile(filename: string, content: Buffer): Promise<QuoteRecord[]> {
  const format = detectTabularFormat(filename);

  let rows: TabularRow[];
  try {
    rows = await readRows(format, content);
  } catch (error) {
    tabularFilesCounter.inc({ format, status: 'error' });
    logger.warn('Tabular file could not be parsed', { filename, format, error: errorMessage(error) });
    throw new TabularParseError(filename, errorMessage(error));
  }

  const quotes = parseQuoteRows(rows);
  tabularFilesCounter.inc({ format, status: 'success' });
  logger.info('Parsed tabular quotes', { filename, format, quote_count: quotes.length });
  return quotes;
}
