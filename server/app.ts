import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import multer from 'multer';
import type { Server } from 'http';
import { registerRoutes } from './routes';
import { log, logError } from './logger';
import type { IStorage } from './storage';
import { formatDateCell } from './utils/csvExport';
import { HttpError, toHttpError } from './utils/errors';

export interface AppOptions {
  storage?: IStorage;
}

function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on('finish', () => {
    const duration = Date.now() - start;
    if (path.startsWith('/api')) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + '…';
      }

      log(logLine);
    }
  });

  next();
}

// Даты в ответах API пишутся так же, как в CSV: календарный день без сдвига в UTC
function jsonDateReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown = typeof this === 'object' && this !== null ? Reflect.get(this, key) : undefined;
  return raw instanceof Date ? formatDateCell(raw) : value;
}

function toResponseError(err: unknown): HttpError {
  if (err instanceof multer.MulterError) {
    const message =
      err.code === 'LIMIT_FILE_SIZE' ? 'Файл слишком большой' : `Ошибка загрузки: ${err.message}`;
    return new HttpError(message, err.code === 'LIMIT_FILE_SIZE' ? 413 : 400);
  }
  // express.json() отдаёт SyntaxError со status 400
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return new HttpError('Некорректный JSON в теле запроса', 400);
  }
  return toHttpError(err);
}

/**
 * Express app with every API route registered; the caller decides when to listen.
 */
export function createApp(options: AppOptions = {}): { app: Express; server: Server } {
  const app = express();
  app.set('trust proxy', 1);
  app.set('json replacer', jsonDateReplacer);
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  app.use(requestLogger);

  const server = registerRoutes(app, options.storage);

  app.use('/api', (req, res) => {
    res.status(404).json({ error: `Маршрут ${req.method} ${req.originalUrl.split('?')[0]} не найден` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const httpError = toResponseError(err);
    if (httpError.status >= 500) {
      logError('Server error', err);
    }
    res.status(httpError.status).json({ error: httpError.message });
  });

  return { app, server };
}
