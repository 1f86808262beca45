import { describe, expect, it } from 'vitest';
import type { DataTable } from '@shared/schema';
import {
  calculateBasicStats,
  calculateCorrelation,
  describeTable,
  detectOutliers,
  getPercentile,
  groupAndAggregate,
  topN,
} from '../statistics';

const sales: DataTable = {
  columns: [
    { name: 'g', kind: 'categorical' },
    { name: 'v', kind: 'numeric' },
    { name: 'w', kind: 'numeric' },
  ],
  rows: [
    { g: 'a', v: 1, w: 2 },
    { g: 'b', v: 2, w: 4 },
    { g: 'a', v: 3, w: 6 },
    { g: 'b', v: 4, w: 8 },
    { g: 'a', v: 100, w: 10 },
    { g: null, v: 50, w: null },
  ],
};

const withoutBlankGroup: DataTable = { columns: sales.columns, rows: sales.rows.slice(0, 5) };

describe('getPercentile', () => {
  it('interpolates between neighbouring ranks', () => {
    expect(getPercentile([1, 2, 3, 5], 0.25)).toBe(1.75);
    expect(getPercentile([1, 2, 3, 5], 0.5)).toBe(2.5);
    expect(getPercentile([7], 0.9)).toBe(7);
    expect(getPercentile([], 0.5)).toBe(0);
  });
});

describe('calculateBasicStats', () => {
  it('summarises a numeric column', () => {
    const stats = calculateBasicStats(withoutBlankGroup, 'v');
    expect(stats.mean).toBe(22);
    expect(stats.median).toBe(3);
    expect(stats.std).toBeCloseTo(Math.sqrt(1902.5), 10);
    expect(stats.min).toBe(1);
    expect(stats.max).toBe(100);
    expect(stats.q25).toBe(2);
    expect(stats.q75).toBe(4);
  });

  it('reports no deviation for a single value', () => {
    const single: DataTable = { columns: [{ name: 'v', kind: 'numeric' }], rows: [{ v: 5 }] };
    expect(calculateBasicStats(single, 'v').std).toBeNull();
  });

  it('rejects text columns', () => {
    expect(() => calculateBasicStats(sales, 'g')).toThrow('Столбец "g" должен быть числовым');
  });
});

describe('describeTable', () => {
  it('covers every numeric column', () => {
    const [v, w] = describeTable(sales);
    expect(v.column).toBe('v');
    expect(v.count).toBe(6);
    expect(w).toEqual({
      column: 'w',
      count: 5,
      mean: 6,
      std: Math.sqrt(10),
      min: 2,
      q25: 4,
      q50: 6,
      q75: 8,
      max: 10,
    });
  });
});

describe('calculateCorrelation', () => {
  const linear: DataTable = {
    columns: [
      { name: 'x', kind: 'numeric' },
      { name: 'up', kind: 'numeric' },
      { name: 'down', kind: 'numeric' },
      { name: 'flat', kind: 'numeric' },
    ],
    rows: [1, 2, 3, 4, 5].map((x) => ({ x, up: 2 * x, down: 6 - x, flat: 7 })),
  };

  it('builds a Pearson matrix over numeric columns', () => {
    const { columns, values } = calculateCorrelation(linear);
    expect(columns).toEqual(['x', 'up', 'down', 'flat']);
    expect(values[0][0]).toBe(1);
    expect(values[0][1]).toBeCloseTo(1, 10);
    expect(values[0][2]).toBeCloseTo(-1, 10);
    expect(values[1][2]).toBeCloseTo(-1, 10);
  });

  it('leaves constant columns undefined', () => {
    const { values } = calculateCorrelation(linear);
    expect(values[3][3]).toBeNull();
    expect(values[0][3]).toBeNull();
  });

  it('needs at least two columns', () => {
    expect(() => calculateCorrelation(linear, ['x'])).toThrow(
      'Для корреляционного анализа нужно минимум 2 числовых столбца',
    );
  });
});

describe('groupAndAggregate', () => {
  it('sums per group in first-appearance order and skips blank keys', () => {
    expect(groupAndAggregate(sales, 'g', 'v', 'sum')).toEqual({
      columns: [
        { name: 'g', kind: 'categorical' },
        { name: 'sum(v)', kind: 'numeric' },
      ],
      rows: [
        { g: 'a', 'sum(v)': 104 },
        { g: 'b', 'sum(v)': 6 },
      ],
    });
  });

  it('supports the other aggregates', () => {
    const values = (agg: 'mean' | 'count' | 'min' | 'max') =>
      groupAndAggregate(sales, 'g', 'v', agg).rows.map((row) => row[`${agg}(v)`]);
    expect(values('mean')).toEqual([104 / 3, 3]);
    expect(values('count')).toEqual([3, 2]);
    expect(values('min')).toEqual([1, 2]);
    expect(values('max')).toEqual([100, 4]);
  });
});

describe('topN', () => {
  it('returns the largest rows first', () => {
    const top = topN(sales, 'v', 2);
    expect(top.rows.map((row) => row.v)).toEqual([100, 50]);
    expect(top.columns.map((column) => column.name)).toEqual(['g', 'v', 'w']);
  });

  it('keeps input order on ties and validates n', () => {
    const tied: DataTable = {
      columns: [
        { name: 'id', kind: 'categorical' },
        { name: 'score', kind: 'numeric' },
      ],
      rows: [
        { id: 'first', score: 5 },
        { id: 'second', score: 5 },
        { id: 'third', score: 1 },
      ],
    };
    expect(topN(tied, 'score', 2).rows.map((row) => row.id)).toEqual(['first', 'second']);
    expect(() => topN(tied, 'score', 0)).toThrow('Количество строк должно быть от 1 до 100');
  });
});

describe('detectOutliers', () => {
  it('flags values outside 1.5 IQR', () => {
    expect(detectOutliers(withoutBlankGroup, 'v')).toEqual([false, false, false, false, true]);
  });

  it('returns an all-false mask for unknown methods', () => {
    expect(detectOutliers(withoutBlankGroup, 'v', 'zscore')).toEqual([false, false, false, false, false]);
  });
});
