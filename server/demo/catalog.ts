/**
 * Fixed lookup tables behind the synthetic sales datasets.
 * Weight tables sum to 1; order of keys is the draw order.
 */

export const PRODUCT_WEIGHTS = {
  Laptop: 0.15,
  Phone: 0.2,
  Tablet: 0.12,
  Headphones: 0.1,
  Mouse: 0.08,
  Keyboard: 0.07,
  Monitor: 0.13,
  Webcam: 0.05,
  Speaker: 0.06,
  Charger: 0.04,
} as const satisfies Record<string, number>;

export type Product = keyof typeof PRODUCT_WEIGHTS;

export type Category = 'Computers' | 'Mobile' | 'Accessories';

export const PRODUCT_CATEGORIES: Record<Product, Category> = {
  Laptop: 'Computers',
  Phone: 'Mobile',
  Tablet: 'Mobile',
  Headphones: 'Accessories',
  Mouse: 'Accessories',
  Keyboard: 'Accessories',
  Monitor: 'Computers',
  Webcam: 'Accessories',
  Speaker: 'Accessories',
  Charger: 'Accessories',
};

export const BASE_PRICES: Record<Product, number> = {
  Laptop: 1200,
  Phone: 800,
  Tablet: 500,
  Headphones: 150,
  Mouse: 50,
  Keyboard: 80,
  Monitor: 350,
  Webcam: 100,
  Speaker: 120,
  Charger: 30,
};

export const REGION_WEIGHTS = {
  North: 0.22,
  South: 0.18,
  East: 0.25,
  West: 0.2,
  Central: 0.15,
} as const satisfies Record<string, number>;

export const CHANNEL_WEIGHTS = {
  Online: 0.45,
  Retail: 0.35,
  Partner: 0.2,
} as const satisfies Record<string, number>;

export const SEGMENT_WEIGHTS = {
  Enterprise: 0.25,
  SMB: 0.35,
  Consumer: 0.4,
} as const satisfies Record<string, number>;

// Calendar month (1-12) -> quantity multiplier
export const SEASONAL_MULTIPLIERS: Record<number, number> = {
  1: 0.8,
  2: 0.85,
  3: 0.9,
  4: 1.0,
  5: 1.0,
  6: 1.1,
  7: 1.15,
  8: 1.1,
  9: 1.0,
  10: 1.05,
  11: 1.3,
  12: 1.4,
};

export const SALES_REPS: readonly string[] = Array.from(
  { length: 20 },
  (_, i) => `Rep_${String(i + 1).padStart(2, '0')}`,
);

export const TOP_PRODUCT_NAMES: readonly string[] = [
  'Laptop Pro',
  'Smartphone X',
  'Tablet Mini',
  'Wireless Headphones',
  'Gaming Mouse',
  'Mechanical Keyboard',
  '4K Monitor',
  'HD Webcam',
  'Bluetooth Speaker',
  'Fast Charger',
];

export const DEMO_EPOCH = { year: 2023, month: 0, day: 1 } as const;
export const DEMO_WINDOW_DAYS = 365;

export const UNIT_PRICE_JITTER: readonly [number, number] = [0.8, 1.2];
export const COST_RATIO_RANGE: readonly [number, number] = [0.7, 0.85];
export const BASE_QUANTITY_LAMBDA = 2;

export const MONTHLY_RANGES = {
  totalRevenue: [150_000, 250_000],
  totalOrders: [400, 699],
  avgOrderValue: [300, 500],
  customerCount: [300, 499],
  newCustomers: [50, 119],
} as const;

export const TOP_PRODUCT_RANGES = {
  unitsSold: [500, 1999],
  revenue: [50_000, 200_000],
  avgRating: [3.5, 5.0],
  returnRate: [1, 8],
} as const;

/**
 * Splits a weight table into parallel label/weight arrays for SeededRng.weightedPick.
 */
export function weightEntries<K extends string>(
  table: Record<K, number>,
): { labels: K[]; weights: number[] } {
  const labels: K[] = [];
  const weights: number[] = [];
  for (const label in table) {
    labels.push(label);
    weights.push(table[label]);
  }
  return { labels, weights };
}

export function seasonalMultiplier(month: number): number {
  const multiplier = SEASONAL_MULTIPLIERS[month];
  if (multiplier === undefined) {
    throw new Error(`Unknown calendar month: ${month}`);
  }
  return multiplier;
}
