import path from 'node:path';
import * as XLSX from 'xlsx';
import Papa from 'papaparse';
import type { CellValue, ColumnKind, ColumnTypes, DataRow, DataTable, TableColumn } from '@shared/schema';
import { log } from '../logger';
import { FileParseError, UnsupportedFileError } from './errors';
import { detectColumnTypes } from './table';

export type RawCell = string | number | boolean | Date | null | undefined;

export type SupportedExtension = 'csv' | 'xlsx' | 'xls';

export const SUPPORTED_EXTENSIONS: readonly SupportedExtension[] = ['csv', 'xlsx', 'xls'];

export interface ParseResult {
  table: DataTable;
  columnsDetected: ColumnTypes;
  format: SupportedExtension;
}

// Кешируем регулярные выражения для парсинга дат
const DATE_REGEXES = {
  isoDate: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
  isoDateTime: /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/,
  ruFormat: /^(\d{1,2})[.](\d{1,2})[.](\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/,
  slashFormat: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/,
};

// Предкомпилированные регулярные выражения для парсинга чисел
const AMOUNT_REGEXES = {
  candidate: /^\(?[-\u2013\u2014\u2212+]?[\d\u00A0\u202F .,]*\d[\d\u00A0\u202F .,]*\)?$/,
  spaces: /[\u00A0\u202F\s]/g,
  dashes: /[\u2013\u2014\u2212]/g,
  parentheses: /^\((.*)\)$/,
};

function buildLocalDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | null {
  const d = new Date(year, month - 1, day, hours, minutes, seconds);
  // 31.02.2023 и подобное не должно «перетекать» в следующий месяц
  if (isNaN(d.getTime()) || d.getMonth() !== month - 1 || d.getDate() !== day) {
    return null;
  }
  return d;
}

/**
 * Strict date parsing: only the formats the dashboard accepts, never free text.
 */
export function parseDate(value: RawCell): Date | null {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const s = value.trim().replace(/\u00A0/g, ' ');
  if (!s) return null;

  const iso = s.match(DATE_REGEXES.isoDate);
  if (iso) {
    return buildLocalDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
  }

  if (DATE_REGEXES.isoDateTime.test(s)) {
    const d = new Date(s.replace(' ', 'T'));
    return isNaN(d.getTime()) ? null : d;
  }

  // Common RU formats: DD.MM.YYYY[ HH:MM[:SS]]
  const ru = s.match(DATE_REGEXES.ruFormat);
  if (ru) {
    return buildLocalDate(
      parseInt(ru[3], 10),
      parseInt(ru[2], 10),
      parseInt(ru[1], 10),
      ru[4] ? parseInt(ru[4], 10) : 0,
      ru[5] ? parseInt(ru[5], 10) : 0,
      ru[6] ? parseInt(ru[6], 10) : 0,
    );
  }

  // Alternate: DD/MM/YYYY
  const slash = s.match(DATE_REGEXES.slashFormat);
  if (slash) {
    return buildLocalDate(parseInt(slash[3], 10), parseInt(slash[2], 10), parseInt(slash[1], 10));
  }

  return null;
}

/**
 * Parses plain numbers and formatted amounts: "1 234,56", "(12)", "−5".
 */
export function parseAmount(value: RawCell): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!trimmed) return null;

  const plain = Number(trimmed);
  if (Number.isFinite(plain) && !/^0[xob]/i.test(trimmed)) {
    return plain;
  }

  if (!AMOUNT_REGEXES.candidate.test(trimmed)) return null;

  let s = trimmed
    .replace(AMOUNT_REGEXES.spaces, '')
    .replace(AMOUNT_REGEXES.dashes, '-')
    .replace(AMOUNT_REGEXES.parentheses, '-$1');

  const sign = s.startsWith('-') ? -1 : 1;
  s = s.replace(/^[-+]/, '');

  // Decimal separator is the last dot or comma, unless it repeats (then it groups thousands)
  const lastDot = s.lastIndexOf('.');
  const lastComma = s.lastIndexOf(',');
  let decSep: '.' | ',' | null = lastDot === -1 && lastComma === -1 ? null : lastDot > lastComma ? '.' : ',';
  if (decSep && s.split(decSep).length > 2) {
    decSep = null;
  }

  if (decSep) {
    const thouSep = decSep === '.' ? ',' : '.';
    s = s.split(thouSep).join('').replace(decSep, '.');
  } else {
    s = s.replace(/[.,]/g, '');
  }

  if (!/^\d+(\.\d+)?$/.test(s)) return null;
  const num = parseFloat(s);
  return isNaN(num) ? null : sign * num;
}

function isBlank(value: RawCell): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function toText(value: RawCell): string {
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

function inferKind(values: RawCell[]): ColumnKind {
  const present = values.filter((value) => !isBlank(value));
  if (present.length === 0) return 'numeric';
  if (present.every((value) => parseDate(value) !== null)) return 'datetime';
  if (present.every((value) => parseAmount(value) !== null)) return 'numeric';
  return 'categorical';
}

function convertCell(value: RawCell, kind: ColumnKind): CellValue {
  if (isBlank(value)) return null;
  switch (kind) {
    case 'numeric':
      return parseAmount(value);
    case 'datetime':
      return parseDate(value);
    default:
      return toText(value);
  }
}

// pandas-style names for blank and repeated headers
function buildHeaders(headerRow: RawCell[], width: number): string[] {
  const seen = new Map<string, number>();
  const headers: string[] = [];
  for (let i = 0; i < width; i++) {
    const cell = headerRow[i];
    const base = isBlank(cell) ? `Unnamed: ${i}` : toText(cell).replace(/^\uFEFF/, '');
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    headers.push(count === 0 ? base : `${base}.${count}`);
  }
  return headers;
}

/**
 * Turns a header row plus data rows into a typed table.
 * A header without data rows gives an empty table whose columns are all numeric.
 */
export function buildTable(data: RawCell[][]): DataTable {
  const nonEmpty = data.filter((row) => row.some((cell) => !isBlank(cell)));
  if (nonEmpty.length === 0) {
    throw new FileParseError('Файл не содержит данных');
  }

  const [headerRow, ...body] = nonEmpty;
  const width = Math.max(...nonEmpty.map((row) => row.length));
  const headers = buildHeaders(headerRow, width);

  const columns: TableColumn[] = headers.map((name, index) => ({
    name,
    kind: inferKind(body.map((row) => row[index])),
  }));

  const rows: DataRow[] = body.map((raw) => {
    const row: DataRow = {};
    columns.forEach((column, index) => {
      row[column.name] = convertCell(raw[index], column.kind);
    });
    return row;
  });

  return { columns, rows };
}

export async function parseCSVFile(buffer: Buffer): Promise<DataTable> {
  // Remove BOM if present
  let csvText = buffer.toString('utf-8');
  if (csvText.charCodeAt(0) === 0xfeff) {
    csvText = csvText.slice(1);
  }

  const results = Papa.parse<string[]>(csvText, {
    header: false,
    skipEmptyLines: true,
  });

  // UndetectableDelimiter is only a warning for single-column files
  const quoteError = results.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    const where = quoteError.row !== undefined ? `строка ${quoteError.row + 1}: ` : '';
    throw new FileParseError(`${where}${quoteError.message}`);
  }

  return buildTable(results.data);
}

export async function parseExcelFile(buffer: Buffer): Promise<DataTable> {
  const workbook = XLSX.read(buffer, {
    type: 'buffer',
    cellDates: true,
    cellNF: false,
    cellStyles: false,
  });
  const sheetName = workbook.SheetNames[0];
  const worksheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!worksheet) {
    throw new FileParseError('Книга Excel не содержит листов');
  }

  const data = XLSX.utils.sheet_to_json<RawCell[]>(worksheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  return buildTable(data);
}

export function getFileExtension(fileName: string): string {
  return path.extname(fileName).replace(/^\./, '').toLowerCase();
}

function isSupportedExtension(extension: string): extension is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(extension);
}

/**
 * Dispatches on the file extension; every failure surfaces as an HttpError.
 */
export async function parseUploadedFile(fileName: string, buffer: Buffer): Promise<ParseResult> {
  const extension = getFileExtension(fileName);
  if (!isSupportedExtension(extension)) {
    throw new UnsupportedFileError(extension);
  }

  const startTime = performance.now();
  let table: DataTable;
  try {
    table = extension === 'csv' ? await parseCSVFile(buffer) : await parseExcelFile(buffer);
  } catch (error) {
    if (error instanceof FileParseError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileParseError(reason, { cause: error });
  }

  const parseTime = (performance.now() - startTime).toFixed(2);
  const fileSizeKB = (buffer.length / 1024).toFixed(2);
  log(
    `📊 Парсинг ${extension.toUpperCase()}: ${fileSizeKB}KB, ${table.rows.length} строк, ${table.columns.length} столбцов за ${parseTime}ms`,
    'fileParser',
  );

  return { table, columnsDetected: detectColumnTypes(table), format: extension };
}
