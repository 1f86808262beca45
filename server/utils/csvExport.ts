import Papa from 'papaparse';
import { format } from 'date-fns';
import type { CellValue, DataTable } from '@shared/schema';

/**
 * Dates at local midnight are written as calendar days, anything else as an ISO timestamp.
 */
export function formatDateCell(value: Date): string {
  const isMidnight =
    value.getHours() === 0 && value.getMinutes() === 0 && value.getSeconds() === 0 && value.getMilliseconds() === 0;
  return isMidnight ? format(value, 'yyyy-MM-dd') : value.toISOString();
}

function formatCell(value: CellValue | undefined): string | number {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDateCell(value);
  if (typeof value === 'number' && !Number.isFinite(value)) return '';
  return value;
}

/**
 * Header row plus one line per record, comma-separated, same column names as the table.
 */
export function toCsv(table: DataTable): string {
  const fields = table.columns.map((column) => column.name);
  const data = table.rows.map((row) => fields.map((field) => formatCell(row[field])));

  return Papa.unparse({ fields, data }, { newline: '\n', delimiter: ',' });
}

export function toCsvBuffer(table: DataTable): Buffer {
  return Buffer.from(toCsv(table), 'utf-8');
}
