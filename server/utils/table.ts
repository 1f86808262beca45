import type { CellValue, ColumnKind, ColumnTypes, DataRow, DataTable, TableColumn } from '@shared/schema';
import { median } from 'simple-statistics';
import { ValidationError } from './errors';

export function isMissing(value: CellValue | undefined): value is null | undefined {
  return (
    value === null ||
    value === undefined ||
    (typeof value === 'number' && Number.isNaN(value)) ||
    (typeof value === 'string' && value.trim() === '')
  );
}

export function detectColumnTypes(table: DataTable): ColumnTypes {
  const types: ColumnTypes = { numeric: [], categorical: [], datetime: [] };
  for (const column of table.columns) {
    types[column.kind].push(column.name);
  }
  return types;
}

export function columnsOfKind(table: DataTable, kind: ColumnKind): string[] {
  return table.columns.filter((column) => column.kind === kind).map((column) => column.name);
}

export function findColumn(table: DataTable, name: string): TableColumn | undefined {
  return table.columns.find((column) => column.name === name);
}

/**
 * Looks a column up and checks its kind; the message names the column for the UI.
 */
export function requireColumn(table: DataTable, name: string, kind?: ColumnKind): TableColumn {
  const column = findColumn(table, name);
  if (!column) {
    throw new ValidationError(`Столбец "${name}" не найден`);
  }
  if (kind && column.kind !== kind) {
    const expected =
      kind === 'numeric' ? 'числовым' : kind === 'datetime' ? 'столбцом дат' : 'категориальным';
    throw new ValidationError(`Столбец "${name}" должен быть ${expected}`);
  }
  return column;
}

/**
 * Numeric cells of a column with missing values dropped.
 */
export function numericValues(table: DataTable, name: string): number[] {
  const values: number[] = [];
  for (const row of table.rows) {
    const value = row[name];
    if (typeof value === 'number' && Number.isFinite(value)) {
      values.push(value);
    }
  }
  return values;
}

export function countMissing(table: DataTable): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const column of table.columns) {
    counts[column.name] = 0;
  }
  for (const row of table.rows) {
    for (const column of table.columns) {
      if (isMissing(row[column.name])) {
        counts[column.name] += 1;
      }
    }
  }
  return counts;
}

function rowKey(row: DataRow, columns: TableColumn[]): string {
  return JSON.stringify(
    columns.map((column) => {
      const value = row[column.name];
      return value instanceof Date ? value.toISOString() : (value ?? null);
    }),
  );
}

/**
 * Drops exact duplicate rows, then fills missing numeric cells with the column median.
 */
export function cleanTable(table: DataTable): DataTable {
  const seen = new Set<string>();
  const rows: DataRow[] = [];

  for (const row of table.rows) {
    const key = rowKey(row, table.columns);
    if (seen.has(key)) continue;
    seen.add(key);
    rows.push({ ...row });
  }

  for (const column of table.columns) {
    if (column.kind !== 'numeric') continue;
    const present = rows
      .map((row) => row[column.name])
      .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
    if (present.length === 0) continue;

    const fill = median(present);
    for (const row of rows) {
      if (isMissing(row[column.name])) {
        row[column.name] = fill;
      }
    }
  }

  return { columns: table.columns.map((column) => ({ ...column })), rows };
}

export function sliceRows(table: DataTable, offset: number, limit: number): DataRow[] {
  return table.rows.slice(offset, offset + limit);
}
