/**
 * Synthetic sales datasets: detailed orders, monthly rollup and product leaderboard.
 * Each call builds its own SeededRng, so equal (count, seed) give identical tables.
 */

import { addDays, addMonths, getMonth } from 'date-fns';
import {
  DETAILED_SALES_COLUMNS,
  MONTHLY_SUMMARY_COLUMNS,
  TOP_PRODUCTS_COLUMNS,
  type DataTable,
  type DetailedSalesRow,
  type MonthlySummaryRow,
  type TopProductRow,
} from '@shared/schema';
import { SeededRng } from '../utils/seededRng';
import { ValidationError } from '../utils/errors';
import {
  BASE_PRICES,
  BASE_QUANTITY_LAMBDA,
  CHANNEL_WEIGHTS,
  COST_RATIO_RANGE,
  DEMO_EPOCH,
  DEMO_WINDOW_DAYS,
  MONTHLY_RANGES,
  PRODUCT_CATEGORIES,
  PRODUCT_WEIGHTS,
  REGION_WEIGHTS,
  SALES_REPS,
  SEGMENT_WEIGHTS,
  TOP_PRODUCT_NAMES,
  TOP_PRODUCT_RANGES,
  UNIT_PRICE_JITTER,
  seasonalMultiplier,
  weightEntries,
} from './catalog';

export const DEFAULT_SEED = 42;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

const round2 = (value: number) => round(value, 2);

function demoEpoch(): Date {
  return new Date(DEMO_EPOCH.year, DEMO_EPOCH.month, DEMO_EPOCH.day);
}

function drawMany<T>(count: number, draw: () => T): T[] {
  const values: T[] = new Array<T>(count);
  for (let i = 0; i < count; i++) {
    values[i] = draw();
  }
  return values;
}

function drawWeighted<K extends string>(rng: SeededRng, table: Record<K, number>, count: number): K[] {
  const { labels, weights } = weightEntries(table);
  return drawMany(count, () => rng.weightedPick(labels, weights));
}

export function generateDetailed(count: number, seed: number = DEFAULT_SEED): DataTable<DetailedSalesRow> {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError('Количество записей должно быть неотрицательным целым числом');
  }

  const rng = new SeededRng(seed);
  const epoch = demoEpoch();

  // 1. Даты: равномерно по году, по возрастанию
  const dayOffsets = drawMany(count, () => rng.random() * DEMO_WINDOW_DAYS).sort((a, b) => a - b);
  const dates = dayOffsets.map((offset) => addDays(epoch, Math.trunc(offset)));

  // 2-4. Категориальные поля
  const products = drawWeighted(rng, PRODUCT_WEIGHTS, count);
  const regions = drawWeighted(rng, REGION_WEIGHTS, count);
  const channels = drawWeighted(rng, CHANNEL_WEIGHTS, count);
  const segments = drawWeighted(rng, SEGMENT_WEIGHTS, count);

  // 5. Цена с разбросом вокруг базовой
  const unitPrices = products.map((product) =>
    round2(BASE_PRICES[product] * rng.uniform(UNIT_PRICE_JITTER[0], UNIT_PRICE_JITTER[1])),
  );

  // 6. Количество с сезонностью
  const quantities = dates.map((date) => {
    const base = rng.poisson(BASE_QUANTITY_LAMBDA) + 1;
    return Math.max(1, Math.floor(base * seasonalMultiplier(getMonth(date) + 1)));
  });

  // 7. Себестоимость 70-85% от цены
  const costRatios = drawMany(count, () => rng.uniform(COST_RATIO_RANGE[0], COST_RATIO_RANGE[1]));

  // 8. Клиенты, заказы, менеджеры
  const customerPool = Math.max(1, Math.floor(count / 3));
  const customerNumbers = drawMany(count, () => rng.int(1, customerPool));
  const reps = drawMany(count, () => rng.pick(SALES_REPS));

  const rows: DetailedSalesRow[] = new Array<DetailedSalesRow>(count);
  for (let i = 0; i < count; i++) {
    const product = products[i];
    const unitPrice = unitPrices[i];
    const quantity = quantities[i];
    const revenue = round2(unitPrice * quantity);
    const cost = round2(unitPrice * costRatios[i] * quantity);

    rows[i] = {
      order_id: `ORD${String(i + 1).padStart(6, '0')}`,
      date: dates[i],
      customer_id: `CUST${String(customerNumbers[i]).padStart(5, '0')}`,
      product,
      category: PRODUCT_CATEGORIES[product],
      quantity,
      unit_price: unitPrice,
      revenue,
      cost,
      profit: round2(revenue - cost),
      region: regions[i],
      channel: channels[i],
      customer_segment: segments[i],
      sales_rep: reps[i],
    };
  }

  return { columns: [...DETAILED_SALES_COLUMNS], rows };
}

export function generateMonthly(seed: number = DEFAULT_SEED): DataTable<MonthlySummaryRow> {
  const rng = new SeededRng(seed);
  const months = Array.from({ length: 12 }, (_, i) => addMonths(demoEpoch(), i));

  // Каждое поле сэмплируется независимо, столбец за столбцом
  const totalRevenue = drawMany(12, () => round2(rng.uniform(...MONTHLY_RANGES.totalRevenue)));
  const totalOrders = drawMany(12, () => rng.int(...MONTHLY_RANGES.totalOrders));
  const avgOrderValue = drawMany(12, () => round2(rng.uniform(...MONTHLY_RANGES.avgOrderValue)));
  const customerCount = drawMany(12, () => rng.int(...MONTHLY_RANGES.customerCount));
  const newCustomers = drawMany(12, () => rng.int(...MONTHLY_RANGES.newCustomers));

  const rows = months.map<MonthlySummaryRow>((month, i) => ({
    month,
    total_revenue: totalRevenue[i],
    total_orders: totalOrders[i],
    avg_order_value: avgOrderValue[i],
    customer_count: customerCount[i],
    new_customers: newCustomers[i],
  }));

  return { columns: [...MONTHLY_SUMMARY_COLUMNS], rows };
}

export function generateTopProducts(seed: number = DEFAULT_SEED): DataTable<TopProductRow> {
  const rng = new SeededRng(seed);
  const count = TOP_PRODUCT_NAMES.length;

  const unitsSold = drawMany(count, () => rng.int(...TOP_PRODUCT_RANGES.unitsSold));
  const revenue = drawMany(count, () => rng.uniform(...TOP_PRODUCT_RANGES.revenue));
  const ratings = drawMany(count, () => rng.uniform(...TOP_PRODUCT_RANGES.avgRating));
  const returnRates = drawMany(count, () => rng.uniform(...TOP_PRODUCT_RANGES.returnRate));

  const rows = TOP_PRODUCT_NAMES.map<TopProductRow>((product, i) => ({
    product,
    units_sold: unitsSold[i],
    revenue: revenue[i],
    avg_rating: ratings[i],
    return_rate: returnRates[i],
  }));

  // Leaderboard order is part of the contract
  rows.sort((a, b) => b.revenue - a.revenue);
  for (const row of rows) {
    row.revenue = round2(row.revenue);
    row.avg_rating = round(row.avg_rating, 1);
    row.return_rate = round2(row.return_rate);
  }

  return { columns: [...TOP_PRODUCTS_COLUMNS], rows };
}
