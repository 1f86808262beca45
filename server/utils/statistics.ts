import {
  max,
  mean,
  median,
  min,
  sampleCorrelation,
  sampleStandardDeviation,
  sum,
} from 'simple-statistics';
import type {
  AggregateFunction,
  BasicStats,
  CellValue,
  CorrelationMatrix,
  DataRow,
  DataTable,
  DescribeEntry,
} from '@shared/schema';
import { ValidationError } from './errors';
import { columnsOfKind, isMissing, numericValues, requireColumn } from './table';

/**
 * Процентиль с линейной интерполяцией между соседними рангами.
 * Ожидает отсортированный по возрастанию массив.
 */
export const getPercentile = (sorted: number[], percentile: number): number => {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0];

  const rank = (sorted.length - 1) * percentile;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;

  if (upper >= sorted.length) {
    return sorted[sorted.length - 1];
  }

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
};

export const calculateQuartiles = (values: number[]) => {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = getPercentile(sorted, 0.25);
  const q2 = getPercentile(sorted, 0.5);
  const q3 = getPercentile(sorted, 0.75);

  return { sorted, q1, median: q2, q3, iqr: q3 - q1 };
};

function sampleStd(values: number[]): number | null {
  return values.length < 2 ? null : sampleStandardDeviation(values);
}

function requireNumericValues(table: DataTable, column: string): number[] {
  requireColumn(table, column, 'numeric');
  const values = numericValues(table, column);
  if (values.length === 0) {
    throw new ValidationError(`Столбец "${column}" не содержит числовых значений`);
  }
  return values;
}

export function calculateBasicStats(table: DataTable, column: string): BasicStats {
  const values = requireNumericValues(table, column);
  const { q1, q3 } = calculateQuartiles(values);

  return {
    mean: mean(values),
    median: median(values),
    std: sampleStd(values),
    min: min(values),
    max: max(values),
    q25: q1,
    q75: q3,
  };
}

/**
 * Сводка по всем числовым столбцам. Пустые столбцы пропускаются.
 */
export function describeTable(table: DataTable): DescribeEntry[] {
  const entries: DescribeEntry[] = [];
  for (const column of columnsOfKind(table, 'numeric')) {
    const values = numericValues(table, column);
    if (values.length === 0) continue;
    const { sorted, q1, median: q2, q3 } = calculateQuartiles(values);
    entries.push({
      column,
      count: values.length,
      mean: mean(values),
      std: sampleStd(values),
      min: sorted[0],
      q25: q1,
      q50: q2,
      q75: q3,
      max: sorted[sorted.length - 1],
    });
  }
  return entries;
}

function pairedValues(table: DataTable, a: string, b: string): [number[], number[]] {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const row of table.rows) {
    const x = row[a];
    const y = row[b];
    if (typeof x === 'number' && typeof y === 'number' && Number.isFinite(x) && Number.isFinite(y)) {
      xs.push(x);
      ys.push(y);
    }
  }
  return [xs, ys];
}

function pearson(xs: number[], ys: number[]): number | null {
  if (xs.length < 2) return null;
  const r = sampleCorrelation(xs, ys);
  return Number.isFinite(r) ? r : null;
}

/**
 * Корреляция Пирсона по парам строк, где оба значения заполнены.
 */
export function calculateCorrelation(table: DataTable, columns?: string[]): CorrelationMatrix {
  const selected = columns ?? columnsOfKind(table, 'numeric');
  for (const column of selected) {
    requireColumn(table, column, 'numeric');
  }
  if (selected.length < 2) {
    throw new ValidationError('Для корреляционного анализа нужно минимум 2 числовых столбца');
  }

  const values = selected.map((a, i) =>
    selected.map((b, j) => {
      const [xs, ys] = pairedValues(table, a, b);
      if (i === j) {
        const std = sampleStd(xs);
        return std !== null && std > 0 ? 1 : null;
      }
      return pearson(xs, ys);
    }),
  );

  return { columns: selected, values };
}

function groupKey(value: CellValue): string {
  if (value instanceof Date) return `d:${value.toISOString()}`;
  return `${typeof value}:${String(value)}`;
}

function aggregate(values: number[], agg: AggregateFunction): number | null {
  switch (agg) {
    case 'sum':
      return values.length === 0 ? 0 : sum(values);
    case 'count':
      return values.length;
    case 'mean':
      return values.length === 0 ? null : mean(values);
    case 'min':
      return values.length === 0 ? null : min(values);
    case 'max':
      return values.length === 0 ? null : max(values);
  }
}

/**
 * Группировка по столбцу с агрегацией другого. Строки с пустым ключом не учитываются,
 * группы идут в порядке первого появления.
 */
export function groupAndAggregate(
  table: DataTable,
  groupBy: string,
  column: string,
  agg: AggregateFunction,
): DataTable {
  const groupColumn = requireColumn(table, groupBy);
  requireColumn(table, column, agg === 'count' ? undefined : 'numeric');

  const groups = new Map<string, { key: CellValue; values: number[] }>();
  for (const row of table.rows) {
    const key = row[groupBy];
    if (isMissing(key)) continue;

    const id = groupKey(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, values: [] };
      groups.set(id, group);
    }

    const value = row[column];
    if (agg === 'count') {
      // count считает все непустые значения, не только числа
      if (!isMissing(value)) group.values.push(1);
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      group.values.push(value);
    }
  }

  const resultName = `${agg}(${column})`;
  const rows: DataRow[] = Array.from(groups.values()).map((group) => ({
    [groupBy]: group.key,
    [resultName]: aggregate(group.values, agg),
  }));

  return {
    columns: [
      { name: groupBy, kind: groupColumn.kind },
      { name: resultName, kind: 'numeric' },
    ],
    rows,
  };
}

/**
 * n строк с наибольшими значениями столбца; при равенстве сохраняется исходный порядок.
 */
export function topN(table: DataTable, column: string, n: number): DataTable {
  requireColumn(table, column, 'numeric');
  if (!Number.isInteger(n) || n < 1 || n > 100) {
    throw new ValidationError('Количество строк должно быть от 1 до 100');
  }

  const ranked = table.rows
    .map((row, index) => ({ row, index, value: row[column] }))
    .filter(
      (entry): entry is { row: DataRow; index: number; value: number } =>
        typeof entry.value === 'number' && Number.isFinite(entry.value),
    )
    .sort((a, b) => b.value - a.value || a.index - b.index);

  return {
    columns: table.columns.map((c) => ({ ...c })),
    rows: ranked.slice(0, n).map((entry) => ({ ...entry.row })),
  };
}

/**
 * Маска выбросов по правилу 1.5·IQR. Неизвестный метод и пустые ячейки дают false.
 */
export function detectOutliers(table: DataTable, column: string, method = 'iqr'): boolean[] {
  requireColumn(table, column, 'numeric');
  if (method !== 'iqr') {
    return table.rows.map(() => false);
  }

  const values = numericValues(table, column);
  if (values.length === 0) {
    return table.rows.map(() => false);
  }

  const { q1, q3, iqr } = calculateQuartiles(values);
  const lowerBound = q1 - 1.5 * iqr;
  const upperBound = q3 + 1.5 * iqr;

  return table.rows.map((row) => {
    const value = row[column];
    return typeof value === 'number' && (value < lowerBound || value > upperBound);
  });
}
