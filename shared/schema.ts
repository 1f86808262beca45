import { z } from 'zod';

// Table model shared by generated and uploaded datasets
export type ColumnKind = 'numeric' | 'categorical' | 'datetime';

export type CellValue = number | string | Date | null;

export interface TableColumn {
  name: string;
  kind: ColumnKind;
}

export type DataRow = Record<string, CellValue>;

export interface DataTable<R extends DataRow = DataRow> {
  columns: TableColumn[];
  rows: R[];
}

export interface ColumnTypes {
  numeric: string[];
  categorical: string[];
  datetime: string[];
}

// Детальные продажи: одна строка на заказ
export type DetailedSalesRow = {
  order_id: string;
  date: Date;
  customer_id: string;
  product: string;
  category: string;
  quantity: number;
  unit_price: number;
  revenue: number;
  cost: number;
  profit: number;
  region: string;
  channel: string;
  customer_segment: string;
  sales_rep: string;
};

// Месячная статистика
export type MonthlySummaryRow = {
  month: Date;
  total_revenue: number;
  total_orders: number;
  avg_order_value: number;
  customer_count: number;
  new_customers: number;
};

// Рейтинг продуктов
export type TopProductRow = {
  product: string;
  units_sold: number;
  revenue: number;
  avg_rating: number;
  return_rate: number;
};

export const DETAILED_SALES_COLUMNS: readonly TableColumn[] = [
  { name: 'order_id', kind: 'categorical' },
  { name: 'date', kind: 'datetime' },
  { name: 'customer_id', kind: 'categorical' },
  { name: 'product', kind: 'categorical' },
  { name: 'category', kind: 'categorical' },
  { name: 'quantity', kind: 'numeric' },
  { name: 'unit_price', kind: 'numeric' },
  { name: 'revenue', kind: 'numeric' },
  { name: 'cost', kind: 'numeric' },
  { name: 'profit', kind: 'numeric' },
  { name: 'region', kind: 'categorical' },
  { name: 'channel', kind: 'categorical' },
  { name: 'customer_segment', kind: 'categorical' },
  { name: 'sales_rep', kind: 'categorical' },
];

export const MONTHLY_SUMMARY_COLUMNS: readonly TableColumn[] = [
  { name: 'month', kind: 'datetime' },
  { name: 'total_revenue', kind: 'numeric' },
  { name: 'total_orders', kind: 'numeric' },
  { name: 'avg_order_value', kind: 'numeric' },
  { name: 'customer_count', kind: 'numeric' },
  { name: 'new_customers', kind: 'numeric' },
];

export const TOP_PRODUCTS_COLUMNS: readonly TableColumn[] = [
  { name: 'product', kind: 'categorical' },
  { name: 'units_sold', kind: 'numeric' },
  { name: 'revenue', kind: 'numeric' },
  { name: 'avg_rating', kind: 'numeric' },
  { name: 'return_rate', kind: 'numeric' },
];

export type DatasetSource = 'uploaded' | 'demo' | 'generated';

export interface ActiveDataset {
  name: string;
  source: DatasetSource;
  table: DataTable;
  loadedAt: Date;
}

export interface DemoDatasetInfo {
  id: string;
  label: string;
  description: string;
  rows: number;
}

export interface DatasetSummary {
  name: string;
  source: DatasetSource;
  rowCount: number;
  columns: TableColumn[];
  loadedAt: string;
}

export interface FileUploadResponse {
  success: boolean;
  dataset: DatasetSummary;
}

export interface ColumnInfo {
  name: string;
  kind: ColumnKind;
  missing: number;
}

export interface DescribeEntry {
  column: string;
  count: number;
  mean: number;
  // null when fewer than two values
  std: number | null;
  min: number;
  q25: number;
  q50: number;
  q75: number;
  max: number;
}

export interface BasicStats {
  mean: number;
  median: number;
  std: number | null;
  min: number;
  max: number;
  q25: number;
  q75: number;
}

export interface OverviewResponse {
  source: DatasetSource;
  name: string;
  rowCount: number;
  columnCount: number;
  missingValues: number;
  columns: ColumnInfo[];
  describe: DescribeEntry[];
}

export interface KpiResponse {
  recordCount: number;
  columnCount: number;
  revenueColumn: string | null;
  dateColumn: string | null;
  totalRevenue: number | null;
  averageRevenue: number | null;
  growthPercent: number | null;
}

export interface CorrelationMatrix {
  columns: string[];
  // null where a column is constant or has too few paired values
  values: (number | null)[][];
}

export type AggregateFunction = 'sum' | 'mean' | 'count' | 'min' | 'max';

export interface ChartPoint {
  x: CellValue;
  y: number;
}

export interface BoxSummary {
  group: string | null;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  count: number;
}

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

export type ChartData =
  | { type: 'line' | 'scatter' | 'bar'; title: string; x: string; y: string; points: ChartPoint[] }
  | { type: 'pie'; title: string; names: string; values: string; slices: { name: string; value: number }[] }
  | { type: 'box'; title: string; x: string | null; y: string; boxes: BoxSummary[] }
  | { type: 'histogram'; title: string; x: string; bins: HistogramBin[] };

// Request validation
const columnName = z.string().trim().min(1, 'Укажите столбец');

export const generateDatasetSchema = z.object({
  count: z.coerce
    .number()
    .int('Количество записей должно быть целым числом')
    .min(0, 'Количество записей не может быть отрицательным')
    .max(100_000, 'Не более 100000 записей'),
  seed: z.coerce
    .number()
    .int('Seed должен быть целым числом')
    .min(0, 'Seed должен быть в диапазоне от 0 до 4294967295')
    .max(0xffffffff, 'Seed должен быть в диапазоне от 0 до 4294967295')
    .default(42),
});

export const rowsQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const kpiQuerySchema = z.object({
  revenueColumn: columnName.optional(),
  dateColumn: columnName.optional(),
});

export const chartRequestSchema = z.object({
  type: z.enum(['line', 'bar', 'pie', 'scatter', 'box', 'histogram']),
  x: columnName,
  y: columnName,
});

export const correlationRequestSchema = z.object({
  columns: z.array(columnName).optional(),
});

export const topNRequestSchema = z.object({
  sortBy: columnName,
  n: z.coerce.number().int().min(1).max(100).default(10),
});

export const groupRequestSchema = z.object({
  groupBy: columnName,
  column: columnName,
  agg: z.enum(['sum', 'mean', 'count', 'min', 'max']).default('sum'),
});

export const outliersRequestSchema = z.object({
  column: columnName,
  method: z.string().default('iqr'),
});

export const statsRequestSchema = z.object({
  column: columnName,
});

export type KpiQuery = z.infer<typeof kpiQuerySchema>;
export type ChartRequest = z.infer<typeof chartRequestSchema>;
