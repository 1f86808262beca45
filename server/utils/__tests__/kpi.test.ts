import { describe, expect, it } from 'vitest';
import type { DataTable } from '@shared/schema';
import { calculateGrowth, calculateKpis } from '../kpi';
import { ValidationError } from '../errors';

const table: DataTable = {
  columns: [
    { name: 'date', kind: 'datetime' },
    { name: 'shop', kind: 'categorical' },
    { name: 'amount', kind: 'numeric' },
  ],
  rows: [
    { date: new Date(2023, 0, 3), shop: 'A', amount: 30 },
    { date: new Date(2023, 0, 1), shop: 'B', amount: 10 },
    { date: new Date(2023, 0, 4), shop: 'A', amount: 40 },
    { date: new Date(2023, 0, 2), shop: 'B', amount: 20 },
  ],
};

describe('calculateKpis', () => {
  it('computes revenue metrics for the designated column', () => {
    const kpis = calculateKpis(table, { revenueColumn: 'amount' });
    expect(kpis.recordCount).toBe(4);
    expect(kpis.columnCount).toBe(3);
    expect(kpis.revenueColumn).toBe('amount');
    expect(kpis.dateColumn).toBe('date');
    expect(kpis.totalRevenue).toBe(100);
    expect(kpis.averageRevenue).toBe(25);
    // (30 + 40 - (10 + 20)) / (10 + 20)
    expect(kpis.growthPercent).toBeCloseTo(133.3333, 4);
  });

  it('does not guess a revenue column', () => {
    expect(calculateKpis(table)).toEqual({
      recordCount: 4,
      columnCount: 3,
      revenueColumn: null,
      dateColumn: 'date',
      totalRevenue: null,
      averageRevenue: null,
      growthPercent: null,
    });
  });

  it('rejects unknown or non-numeric revenue columns', () => {
    expect(() => calculateKpis(table, { revenueColumn: 'shop' })).toThrow('Столбец "shop" должен быть числовым');
    expect(() => calculateKpis(table, { revenueColumn: 'sales' })).toThrow('Столбец "sales" не найден');
    expect(() => calculateKpis(table, { revenueColumn: 'amount', dateColumn: 'shop' })).toThrow(ValidationError);
  });

  it('requires at least one numeric column', () => {
    const text: DataTable = { columns: [{ name: 'shop', kind: 'categorical' }], rows: [{ shop: 'A' }] };
    expect(() => calculateKpis(text)).toThrow('В данных не найдено числовых столбцов для расчета метрик');
  });
});

describe('calculateGrowth', () => {
  it('puts the middle row of an odd table into the recent half', () => {
    const odd: DataTable = {
      columns: table.columns,
      rows: [
        { date: new Date(2023, 0, 1), shop: 'A', amount: 10 },
        { date: new Date(2023, 0, 2), shop: 'A', amount: 20 },
        { date: new Date(2023, 0, 3), shop: 'A', amount: 30 },
      ],
    };
    expect(calculateGrowth(odd, 'amount', 'date')).toBe(400);
  });

  it('returns 0 when the older half has no revenue', () => {
    const flatStart: DataTable = {
      columns: table.columns,
      rows: [
        { date: new Date(2023, 0, 1), shop: 'A', amount: 0 },
        { date: new Date(2023, 0, 2), shop: 'A', amount: 0 },
        { date: new Date(2023, 0, 3), shop: 'A', amount: 5 },
        { date: new Date(2023, 0, 4), shop: 'A', amount: 5 },
      ],
    };
    expect(calculateGrowth(flatStart, 'amount', 'date')).toBe(0);
  });

  it('sorts rows without a date to the end', () => {
    const undated: DataTable = {
      columns: table.columns,
      rows: [
        { date: null, shop: 'A', amount: 100 },
        { date: new Date(2023, 0, 1), shop: 'A', amount: 10 },
      ],
    };
    // older: 10, recent: 100
    expect(calculateGrowth(undated, 'amount', 'date')).toBe(900);
  });
});
