import type { Express } from 'express';
import {
  chartRequestSchema,
  correlationRequestSchema,
  groupRequestSchema,
  kpiQuerySchema,
  outliersRequestSchema,
  statsRequestSchema,
  topNRequestSchema,
  type OverviewResponse,
} from '@shared/schema';
import { log } from '../logger';
import type { IStorage } from '../storage';
import { buildChart } from '../utils/charts';
import { sendError } from '../utils/errors';
import { calculateKpis } from '../utils/kpi';
import {
  calculateBasicStats,
  calculateCorrelation,
  describeTable,
  detectOutliers,
  groupAndAggregate,
  topN,
} from '../utils/statistics';
import { requireActiveDataset } from '../utils/session';
import { countMissing } from '../utils/table';

export function registerAnalyticsRoutes(app: Express, storage: IStorage): void {
  app.get('/api/overview', async (_req, res) => {
    try {
      const { name, source, table } = await requireActiveDataset(storage, res);
      const missing = countMissing(table);

      const response: OverviewResponse = {
        source,
        name,
        rowCount: table.rows.length,
        columnCount: table.columns.length,
        missingValues: Object.values(missing).reduce((acc, count) => acc + count, 0),
        columns: table.columns.map((column) => ({
          name: column.name,
          kind: column.kind,
          missing: missing[column.name] ?? 0,
        })),
        describe: describeTable(table),
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.get('/api/kpi', async (req, res) => {
    try {
      const query = kpiQuerySchema.parse(req.query);
      const { table } = await requireActiveDataset(storage, res);
      res.json(calculateKpis(table, query));
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.post('/api/charts', async (req, res) => {
    try {
      const request = chartRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      const startTime = performance.now();
      const chart = buildChart(table, request);
      log(
        `📈 ${request.type} (${request.x} × ${request.y}) за ${(performance.now() - startTime).toFixed(2)}ms`,
        'charts',
      );
      res.json(chart);
    } catch (error) {
      sendError(res, error, 'charts');
    }
  });

  app.post('/api/analysis/correlation', async (req, res) => {
    try {
      const { columns } = correlationRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      res.json(calculateCorrelation(table, columns));
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.post('/api/analysis/top', async (req, res) => {
    try {
      const { sortBy, n } = topNRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      res.json(topN(table, sortBy, n));
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.post('/api/analysis/group', async (req, res) => {
    try {
      const { groupBy, column, agg } = groupRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      res.json(groupAndAggregate(table, groupBy, column, agg));
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.post('/api/analysis/outliers', async (req, res) => {
    try {
      const { column, method } = outliersRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      const mask = detectOutliers(table, column, method);
      res.json({
        column,
        method,
        count: mask.filter(Boolean).length,
        mask,
      });
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });

  app.post('/api/analysis/stats', async (req, res) => {
    try {
      const { column } = statsRequestSchema.parse(req.body ?? {});
      const { table } = await requireActiveDataset(storage, res);
      res.json({ column, stats: calculateBasicStats(table, column) });
    } catch (error) {
      sendError(res, error, 'analytics');
    }
  });
}
