import type { AddressInfo } from 'node:net';
import type { Server } from 'http';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../../app';
import { MemStorage } from '../../storage';
import { config } from '../../config';
import { generateDetailed } from '../../demo/generator';

let server: Server;
let storage: MemStorage;
let baseUrl: string;

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

beforeAll(async () => {
  storage = new MemStorage();
  server = createApp({ storage }).server;
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!isAddressInfo(address)) throw new Error('server is not listening on a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

/**
 * Minimal browser stand-in: keeps the session cookie between requests.
 */
class Client {
  private cookie: string | null = null;

  async request(path: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    if (this.cookie) headers.set('Cookie', this.cookie);
    const res = await fetch(`${baseUrl}${path}`, { ...init, headers });
    const match = res.headers.get('set-cookie')?.match(/dataset_session=([^;]+)/);
    if (match) this.cookie = `dataset_session=${match[1]}`;
    return res;
  }

  post(path: string, body: unknown = {}): Promise<Response> {
    return this.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  upload(fileName: string, content: string): Promise<Response> {
    const form = new FormData();
    form.append('file', new Blob([content], { type: 'application/octet-stream' }), fileName);
    return this.request('/api/datasets/upload', { method: 'POST', body: form });
  }
}

// Reads a nested field of a parsed JSON body
function pick(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

let client: Client;

beforeEach(() => {
  client = new Client();
});

describe('HTTP API', () => {
  it('answers the health check', async () => {
    const res = await client.request('/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', sessions: 0 });
  });

  it('lists the demo catalog', async () => {
    const res = await client.request('/api/demo-datasets');
    expect(await res.json()).toMatchObject({
      datasets: [{ id: 'detailed' }, { id: 'monthly' }, { id: 'top-products' }],
    });
  });

  it('requires a loaded dataset for analyses', async () => {
    const res = await client.request('/api/overview');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Данные не загружены. Загрузите файл или выберите демо-данные' });
  });

  it('loads a demo dataset, describes it and exports it as CSV', async () => {
    const loaded = await client.post('/api/datasets/demo/monthly');
    expect(loaded.status).toBe(200);
    expect(await loaded.json()).toMatchObject({
      success: true,
      dataset: { name: '📅 Месячная статистика (12 месяцев)', source: 'demo', rowCount: 12 },
    });

    const overview = await (await client.request('/api/overview')).json();
    expect(overview).toMatchObject({
      rowCount: 12,
      columnCount: 6,
      missingValues: 0,
      describe: [
        { column: 'total_revenue', count: 12 },
        { column: 'total_orders', count: 12 },
        { column: 'avg_order_value', count: 12 },
        { column: 'customer_count', count: 12 },
        { column: 'new_customers', count: 12 },
      ],
    });

    const download = await client.request('/api/datasets/current/download');
    expect(download.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(download.headers.get('content-disposition')).toBe('attachment; filename="sales_data.csv"');
    const lines = (await download.text()).split('\n');
    expect(lines).toHaveLength(13);
    expect(lines[0]).toBe('month,total_revenue,total_orders,avg_order_value,customer_count,new_customers');
    expect(lines[1].startsWith('2023-01-01,')).toBe(true);
  });

  it('writes date cells as calendar days', async () => {
    await client.post('/api/datasets/demo/monthly');
    const page = await (await client.request('/api/datasets/current/rows?limit=2')).json();
    expect(pick(page, 'rows', 0, 'month')).toBe('2023-01-01');
    expect(pick(page, 'rows', 1, 'month')).toBe('2023-02-01');
  });

  it('rejects unknown demo ids', async () => {
    const res = await client.post('/api/datasets/demo/weekly');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Демо-датасет "weekly" не найден' });
  });

  it('generates a dataset and runs analyses over it', async () => {
    const generated = await client.post('/api/datasets/generate', { count: 50, seed: 1 });
    expect(generated.status).toBe(200);
    expect(await generated.json()).toMatchObject({ dataset: { source: 'generated', rowCount: 50 } });

    const expectedTotal = generateDetailed(50, 1).rows.reduce((acc, row) => acc + row.revenue, 0);
    const kpi = await (await client.request('/api/kpi?revenueColumn=revenue')).json();
    expect(kpi).toMatchObject({
      recordCount: 50,
      revenueColumn: 'revenue',
      dateColumn: 'date',
      totalRevenue: expect.closeTo(expectedTotal, 6),
    });

    const page = await (await client.request('/api/datasets/current/rows?offset=10&limit=5')).json();
    expect(pick(page, 'total')).toBe(50);
    expect(pick(page, 'rows', 'length')).toBe(5);
    expect(pick(page, 'rows', 0, 'order_id')).toBe('ORD000011');

    const group = await (await client.post('/api/analysis/group', { groupBy: 'category', column: 'profit' })).json();
    expect(pick(group, 'columns')).toEqual([
      { name: 'category', kind: 'categorical' },
      { name: 'sum(profit)', kind: 'numeric' },
    ]);

    const pie = await client.post('/api/charts', { type: 'pie', x: 'quantity', y: 'revenue' });
    expect(pie.status).toBe(400);
    expect(await pie.json()).toEqual({ error: 'Для круговой диаграммы нужна категориальная переменная на оси X' });

    const top = await (await client.post('/api/analysis/top', { sortBy: 'revenue', n: 3 })).json();
    const revenues = [0, 1, 2].map((i) => pick(top, 'rows', i, 'revenue'));
    const expectedTop = generateDetailed(50, 1)
      .rows.map((row) => row.revenue)
      .sort((a, b) => b - a)
      .slice(0, 3);
    expect(revenues).toEqual(expectedTop);
    expect(pick(top, 'rows', 'length')).toBe(3);
  });

  it('validates request bodies', async () => {
    const res = await client.post('/api/datasets/generate', { count: -1 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'count: Количество записей не может быть отрицательным' });
  });

  it('parses an uploaded CSV file', async () => {
    const res = await client.upload('sales.csv', 'date,region,revenue\n2023-01-01,North,100\n2023-01-02,South,300\n');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      dataset: {
        name: 'sales.csv',
        source: 'uploaded',
        rowCount: 2,
        columns: [
          { name: 'date', kind: 'datetime' },
          { name: 'region', kind: 'categorical' },
          { name: 'revenue', kind: 'numeric' },
        ],
      },
    });

    const kpi = await (await client.request('/api/kpi?revenueColumn=revenue')).json();
    expect(pick(kpi, 'growthPercent')).toBe(200);
  });

  it('leaves nothing loaded after a failed upload', async () => {
    await client.post('/api/datasets/demo/top-products');
    expect((await client.request('/api/datasets/current')).status).toBe(200);

    const res = await client.upload('notes.txt', 'hello');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Неподдерживаемый формат файла. Используйте .csv, .xlsx или .xls' });
    expect((await client.request('/api/datasets/current')).status).toBe(404);
  });

  it('clears the session when a file is rejected as too large', async () => {
    await client.post('/api/datasets/demo/monthly');
    expect((await client.request('/api/datasets/current')).status).toBe(200);

    const res = await client.upload('big.csv', 'a'.repeat(config.uploadMaxBytes + 10));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Файл слишком большой' });
    expect((await client.request('/api/datasets/current')).status).toBe(404);
  });

  it('rejects seeds outside the unsigned 32-bit range', async () => {
    const res = await client.post('/api/datasets/generate', { count: 10, seed: -1 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'seed: Seed должен быть в диапазоне от 0 до 4294967295' });
  });

  it('keeps sessions apart and clears on request', async () => {
    await client.post('/api/datasets/demo/monthly');
    const other = new Client();
    expect((await other.request('/api/overview')).status).toBe(404);

    const cleared = await client.request('/api/datasets/current', { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ success: true, cleared: true });
    expect((await client.request('/api/overview')).status).toBe(404);
  });

  it('answers unknown API routes with 404', async () => {
    const res = await client.request('/api/unknown');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Маршрут GET /api/unknown не найден' });
  });
});
