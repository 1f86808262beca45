import { describe, expect, it } from 'vitest';
import type { DataTable } from '@shared/schema';
import { formatDateCell, toCsv, toCsvBuffer } from '../csvExport';
import { parseUploadedFile } from '../fileParser';
import { generateDetailed, generateMonthly } from '../../demo/generator';

describe('formatDateCell', () => {
  it('writes midnight as a calendar day and other times as ISO', () => {
    expect(formatDateCell(new Date(2023, 0, 1))).toBe('2023-01-01');
    const noon = new Date(2023, 0, 1, 12, 30);
    expect(formatDateCell(noon)).toBe(noon.toISOString());
  });
});

describe('toCsv', () => {
  it('writes a header, quotes delimiters and leaves nulls empty', () => {
    const table: DataTable = {
      columns: [
        { name: 'date', kind: 'datetime' },
        { name: 'name', kind: 'categorical' },
        { name: 'value', kind: 'numeric' },
      ],
      rows: [
        { date: new Date(2023, 0, 5), name: 'A, B', value: 1.5 },
        { date: null, name: 'C', value: null },
      ],
    };

    expect(toCsv(table)).toBe('date,name,value\n2023-01-05,"A, B",1.5\n,C,');
  });

  it('encodes UTF-8', () => {
    const table: DataTable = {
      columns: [{ name: 'регион', kind: 'categorical' }],
      rows: [{ регион: 'Север' }],
    };
    expect(toCsvBuffer(table).toString('utf-8')).toBe('регион\nСевер');
  });
});

describe('CSV round-trip', () => {
  it('keeps rows, dates and numeric values of the detailed dataset', async () => {
    const original = generateDetailed(200, 42);
    const originalRows: DataTable['rows'] = original.rows;
    const { table } = await parseUploadedFile('sales_data.csv', toCsvBuffer(original));

    expect(table.rows).toHaveLength(200);
    expect(table.columns).toEqual(original.columns);

    const numeric = original.columns.filter((column) => column.kind === 'numeric').map((c) => c.name);
    table.rows.forEach((row, i) => {
      for (const name of numeric) {
        const value = row[name];
        expect(typeof value).toBe('number');
        if (typeof value === 'number') {
          expect(value).toBeCloseTo(Number(originalRows[i][name]), 6);
        }
      }
      expect(row.date).toEqual(originalRows[i].date);
      expect(row.customer_id).toBe(originalRows[i].customer_id);
    });
  });

  it('keeps the columns of an empty detailed dataset', async () => {
    const original = generateDetailed(0, 42);
    const { table } = await parseUploadedFile('sales_data.csv', toCsvBuffer(original));
    expect(table.rows).toEqual([]);
    expect(table.columns.map((column) => column.name)).toEqual(original.columns.map((column) => column.name));
    expect(table.columns).toHaveLength(14);
  });

  it('keeps the monthly rollup', async () => {
    const original = generateMonthly(42);
    const { table } = await parseUploadedFile('monthly.csv', toCsvBuffer(original));
    expect(table.rows).toHaveLength(12);
    expect(table.rows.map((row) => row.total_revenue)).toEqual(original.rows.map((row) => row.total_revenue));
  });
});
