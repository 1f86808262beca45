import { sum } from 'simple-statistics';
import type { DataRow, DataTable, KpiQuery, KpiResponse } from '@shared/schema';
import { ValidationError } from './errors';
import { columnsOfKind, numericValues, requireColumn } from './table';

function revenueOf(row: DataRow, column: string): number {
  const value = row[column];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function timeOf(row: DataRow, column: string): number | null {
  const value = row[column];
  return value instanceof Date ? value.getTime() : null;
}

/**
 * Рост второй половины данных (по дате) относительно первой, в процентах.
 * Строки без даты уходят в конец.
 */
export function calculateGrowth(table: DataTable, revenueColumn: string, dateColumn: string): number {
  const sorted = table.rows
    .map((row, index) => ({ row, index, time: timeOf(row, dateColumn) }))
    .sort((a, b) => {
      if (a.time === null || b.time === null) {
        if (a.time === b.time) return a.index - b.index;
        return a.time === null ? 1 : -1;
      }
      return a.time - b.time || a.index - b.index;
    })
    .map((entry) => entry.row);

  const mid = Math.floor(sorted.length / 2);
  const older = sorted.slice(0, mid).reduce((acc, row) => acc + revenueOf(row, revenueColumn), 0);
  const recent = sorted.slice(mid).reduce((acc, row) => acc + revenueOf(row, revenueColumn), 0);

  return older > 0 ? ((recent - older) / older) * 100 : 0;
}

export function calculateKpis(table: DataTable, options: KpiQuery = {}): KpiResponse {
  if (columnsOfKind(table, 'numeric').length === 0) {
    throw new ValidationError('В данных не найдено числовых столбцов для расчета метрик');
  }

  const revenueColumn = options.revenueColumn
    ? requireColumn(table, options.revenueColumn, 'numeric').name
    : null;
  const dateColumn = options.dateColumn
    ? requireColumn(table, options.dateColumn, 'datetime').name
    : (columnsOfKind(table, 'datetime')[0] ?? null);

  let totalRevenue: number | null = null;
  let averageRevenue: number | null = null;
  if (revenueColumn) {
    const values = numericValues(table, revenueColumn);
    totalRevenue = values.length === 0 ? 0 : sum(values);
    averageRevenue = values.length === 0 ? null : totalRevenue / values.length;
  }

  return {
    recordCount: table.rows.length,
    columnCount: table.columns.length,
    revenueColumn,
    dateColumn,
    totalRevenue,
    averageRevenue,
    growthPercent:
      revenueColumn && dateColumn ? calculateGrowth(table, revenueColumn, dateColumn) : null,
  };
}
