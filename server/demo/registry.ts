import type { DataTable, DemoDatasetInfo } from '@shared/schema';
import { NotFoundError } from '../utils/errors';
import { DEFAULT_SEED, generateDetailed, generateMonthly, generateTopProducts } from './generator';

export const DEFAULT_RECORD_COUNT = 2000;

export type DemoDatasetId = 'detailed' | 'monthly' | 'top-products';

export interface DemoOptions {
  recordCount?: number;
  seed?: number;
}

interface DemoDatasetDefinition {
  id: DemoDatasetId;
  label: string;
  description: string;
  rows: number;
  build: () => DataTable;
}

function getDefinitions(options: DemoOptions = {}): DemoDatasetDefinition[] {
  const recordCount = options.recordCount ?? DEFAULT_RECORD_COUNT;
  const seed = options.seed ?? DEFAULT_SEED;

  return [
    {
      id: 'detailed',
      label: `📊 Детальные продажи (${recordCount} записей)`,
      description:
        'Подробные данные о продажах с информацией о заказах, продуктах, регионах и каналах',
      rows: recordCount,
      build: () => generateDetailed(recordCount, seed),
    },
    {
      id: 'monthly',
      label: '📅 Месячная статистика (12 месяцев)',
      description: 'Агрегированные месячные показатели выручки, заказов и клиентов за 2023 год',
      rows: 12,
      build: () => generateMonthly(seed),
    },
    {
      id: 'top-products',
      label: '🏆 Топ продукты (10 товаров)',
      description: 'Рейтинг самых популярных продуктов с метриками продаж и рейтингами',
      rows: 10,
      build: () => generateTopProducts(seed),
    },
  ];
}

/**
 * All demo datasets by label, in display order. Tables are generated on every call.
 */
export function listDemoDatasets(options?: DemoOptions): Map<string, DataTable> {
  return new Map(getDefinitions(options).map((def) => [def.label, def.build()]));
}

export function listDemoDescriptions(options?: DemoOptions): Record<string, string> {
  return Object.fromEntries(getDefinitions(options).map((def) => [def.label, def.description]));
}

export function listDemoCatalog(options?: DemoOptions): DemoDatasetInfo[] {
  return getDefinitions(options).map((def) => ({
    id: def.id,
    label: def.label,
    description: def.description,
    rows: def.rows,
  }));
}

export function loadDemoDataset(
  id: string,
  options?: DemoOptions,
): { label: string; table: DataTable } {
  const definition = getDefinitions(options).find((def) => def.id === id);
  if (!definition) {
    throw new NotFoundError(`Демо-датасет "${id}" не найден`);
  }
  return { label: definition.label, table: definition.build() };
}
