import type { Express, RequestHandler, Response } from 'express';
import multer from 'multer';
import {
  generateDatasetSchema,
  rowsQuerySchema,
  type ActiveDataset,
  type DatasetSource,
  type DataTable,
  type FileUploadResponse,
} from '@shared/schema';
import { config } from '../config';
import { listDemoCatalog, loadDemoDataset } from '../demo/registry';
import { generateDetailed } from '../demo/generator';
import { log } from '../logger';
import type { IStorage } from '../storage';
import { toCsvBuffer } from '../utils/csvExport';
import { sendError, ValidationError } from '../utils/errors';
import { parseUploadedFile } from '../utils/fileParser';
import { heavyRateLimit } from '../utils/security';
import { getSessionId, requireActiveDataset, summarizeDataset } from '../utils/session';
import { cleanTable, sliceRows } from '../utils/table';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.uploadMaxBytes,
  },
});

function demoOptions() {
  return { recordCount: config.demoRecordCount, seed: config.demoSeed };
}

async function activate(
  storage: IStorage,
  res: Response,
  name: string,
  source: DatasetSource,
  table: DataTable,
): Promise<FileUploadResponse> {
  const dataset: ActiveDataset = { name, source, table, loadedAt: new Date() };
  await storage.setActiveDataset(getSessionId(res), dataset);
  return { success: true, dataset: summarizeDataset(dataset) };
}

export function registerDatasetRoutes(app: Express, storage: IStorage): void {
  app.get('/api/demo-datasets', (_req, res) => {
    res.json({ datasets: listDemoCatalog(demoOptions()) });
  });

  app.post('/api/datasets/demo/:id', async (req, res) => {
    try {
      const { label, table } = loadDemoDataset(req.params.id, demoOptions());
      res.json(await activate(storage, res, label, 'demo', table));
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  app.post('/api/datasets/generate', heavyRateLimit, async (req, res) => {
    try {
      const { count, seed } = generateDatasetSchema.parse(req.body ?? {});
      const startTime = performance.now();
      const table = generateDetailed(count, seed);
      const generateTime = (performance.now() - startTime).toFixed(2);
      log(`🎲 Сгенерировано ${count} записей (seed ${seed}) за ${generateTime}ms`, 'datasets');

      res.json(
        await activate(storage, res, `Сгенерированные продажи (${count} записей)`, 'generated', table),
      );
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  // Сессия очищается до того, как multer начнёт читать тело:
  // неудачная загрузка (в том числе слишком большой файл) не оставляет старые данные активными
  const clearBeforeUpload: RequestHandler = async (_req, res, next) => {
    try {
      await storage.clearActiveDataset(getSessionId(res));
      next();
    } catch (error) {
      next(error);
    }
  };

  app.post('/api/datasets/upload', heavyRateLimit, clearBeforeUpload, upload.single('file'), async (req, res) => {
    const startTime = performance.now();
    const fileName = req.file?.originalname || 'unknown';

    try {
      if (!req.file) {
        throw new ValidationError('Файл не был загружен');
      }

      const fileSizeKB = (req.file.size / 1024).toFixed(2);
      log(`📤 Начало загрузки файла: ${fileName} (${fileSizeKB} KB)`, 'upload');

      const { table } = await parseUploadedFile(req.file.originalname, req.file.buffer);
      const response = await activate(storage, res, fileName, 'uploaded', table);

      const totalTime = (performance.now() - startTime).toFixed(2);
      log(`✅ Загрузка файла завершена за ${totalTime}ms (строк: ${table.rows.length})`, 'upload');
      res.json(response);
    } catch (error) {
      sendError(res, error, 'upload');
    }
  });

  app.get('/api/datasets/current', async (_req, res) => {
    try {
      const dataset = await requireActiveDataset(storage, res);
      res.json({ dataset: summarizeDataset(dataset) });
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  app.get('/api/datasets/current/rows', async (req, res) => {
    try {
      const { offset, limit } = rowsQuerySchema.parse(req.query);
      const dataset = await requireActiveDataset(storage, res);
      res.json({
        total: dataset.table.rows.length,
        offset,
        limit,
        rows: sliceRows(dataset.table, offset, limit),
      });
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  app.get('/api/datasets/current/download', async (_req, res) => {
    try {
      const dataset = await requireActiveDataset(storage, res);
      const csv = toCsvBuffer(dataset.table);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="sales_data.csv"');
      res.send(csv);
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  // Удаление дубликатов и заполнение пропусков медианой
  app.post('/api/datasets/current/clean', async (_req, res) => {
    try {
      const dataset = await requireActiveDataset(storage, res);
      const cleaned = cleanTable(dataset.table);
      const removed = dataset.table.rows.length - cleaned.rows.length;
      const response = await activate(storage, res, dataset.name, dataset.source, cleaned);
      res.json({ ...response, duplicatesRemoved: removed });
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });

  app.delete('/api/datasets/current', async (_req, res) => {
    try {
      const cleared = await storage.clearActiveDataset(getSessionId(res));
      res.json({ success: true, cleared });
    } catch (error) {
      sendError(res, error, 'datasets');
    }
  });
}
