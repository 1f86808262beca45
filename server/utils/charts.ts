import type {
  BoxSummary,
  ChartData,
  ChartPoint,
  ChartRequest,
  DataTable,
  HistogramBin,
} from '@shared/schema';
import { formatDateCell } from './csvExport';
import { ValidationError } from './errors';
import { calculateQuartiles, groupAndAggregate } from './statistics';
import { isMissing, numericValues, requireColumn } from './table';

function rawPoints(table: DataTable, x: string, y: string): ChartPoint[] {
  const points: ChartPoint[] = [];
  for (const row of table.rows) {
    const yValue = row[y];
    if (typeof yValue !== 'number' || !Number.isFinite(yValue)) continue;
    points.push({ x: row[x] ?? null, y: yValue });
  }
  return points;
}

function summedByGroup(table: DataTable, x: string, y: string): { name: string; value: number }[] {
  const grouped = groupAndAggregate(table, x, y, 'sum');
  const valueColumn = `sum(${y})`;
  return grouped.rows.map((row) => {
    const value = row[valueColumn];
    return { name: String(row[x]), value: typeof value === 'number' ? value : 0 };
  });
}

function boxSummary(group: string | null, values: number[]): BoxSummary {
  const { sorted, q1, median, q3 } = calculateQuartiles(values);
  return {
    group,
    min: sorted[0],
    q1,
    median,
    q3,
    max: sorted[sorted.length - 1],
    count: sorted.length,
  };
}

function boxesByGroup(table: DataTable, x: string, y: string): BoxSummary[] {
  const groups = new Map<string, number[]>();
  for (const row of table.rows) {
    const key = row[x];
    const value = row[y];
    if (isMissing(key) || typeof value !== 'number' || !Number.isFinite(value)) continue;
    const name = key instanceof Date ? formatDateCell(key) : String(key);
    const bucket = groups.get(name);
    if (bucket) {
      bucket.push(value);
    } else {
      groups.set(name, [value]);
    }
  }
  return Array.from(groups, ([name, values]) => boxSummary(name, values));
}

/**
 * Равные интервалы, число корзин по правилу Стёрджеса: ceil(log2(n)) + 1.
 */
export function buildHistogram(values: number[]): HistogramBin[] {
  if (values.length === 0) return [];

  let lo = values[0];
  let hi = values[0];
  for (const value of values) {
    if (value < lo) lo = value;
    if (value > hi) hi = value;
  }
  if (lo === hi) {
    return [{ from: lo, to: hi, count: values.length }];
  }

  const binCount = Math.ceil(Math.log2(values.length)) + 1;
  const width = (hi - lo) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    from: lo + i * width,
    to: i === binCount - 1 ? hi : lo + (i + 1) * width,
    count: 0,
  }));

  for (const value of values) {
    // максимум попадает в последнюю корзину
    const index = Math.min(binCount - 1, Math.floor((value - lo) / width));
    bins[index].count += 1;
  }
  return bins;
}

/**
 * Данные для графика выбранного типа. Ось Y всегда числовая.
 */
export function buildChart(table: DataTable, request: ChartRequest): ChartData {
  const { type, x, y } = request;
  const xColumn = requireColumn(table, x);
  requireColumn(table, y, 'numeric');
  const xIsCategorical = xColumn.kind === 'categorical';

  switch (type) {
    case 'line':
      return { type, title: `${y} по ${x}`, x, y, points: rawPoints(table, x, y) };

    case 'scatter':
      return { type, title: `${y} vs ${x}`, x, y, points: rawPoints(table, x, y) };

    case 'bar': {
      const points = xIsCategorical
        ? summedByGroup(table, x, y).map((slice) => ({ x: slice.name, y: slice.value }))
        : rawPoints(table, x, y);
      return { type, title: `${y} по ${x}`, x, y, points };
    }

    case 'pie':
      if (!xIsCategorical) {
        throw new ValidationError('Для круговой диаграммы нужна категориальная переменная на оси X');
      }
      return {
        type,
        title: `Распределение ${y}`,
        names: x,
        values: y,
        slices: summedByGroup(table, x, y),
      };

    case 'box': {
      if (xIsCategorical) {
        return {
          type,
          title: `Распределение ${y} по ${x}`,
          x,
          y,
          boxes: boxesByGroup(table, x, y),
        };
      }
      const values = numericValues(table, y);
      return {
        type,
        title: `Распределение ${y}`,
        x: null,
        y,
        boxes: values.length === 0 ? [] : [boxSummary(null, values)],
      };
    }

    case 'histogram':
      return {
        type,
        title: `Гистограмма ${y}`,
        x: y,
        bins: buildHistogram(numericValues(table, y)),
      };
  }
}
