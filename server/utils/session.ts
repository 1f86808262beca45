import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import type { ActiveDataset, DatasetSummary } from '@shared/schema';
import { config } from '../config';
import type { IStorage } from '../storage';
import { HttpError, NotFoundError } from './errors';

const uuidRe = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function readSessionCookie(req: Request): string | null {
  const value: unknown = req.cookies?.[config.sessionCookieName];
  return typeof value === 'string' && uuidRe.test(value) ? value : null;
}

/**
 * Id сессии из cookie; при отсутствии выдаёт новый и ставит cookie.
 */
export function resolveSessionId(req: Request, res: Response): string {
  const existing = readSessionCookie(req);
  if (existing) return existing;

  const sessionId = randomUUID();
  res.cookie(config.sessionCookieName, sessionId, {
    httpOnly: true,
    sameSite: 'lax',
    secure: config.isProduction,
    path: '/',
  });
  return sessionId;
}

// Один id на запрос, даже если cookie ещё не было
export function sessionMiddleware(req: Request, res: Response, next: NextFunction) {
  res.locals.sessionId = resolveSessionId(req, res);
  next();
}

export function getSessionId(res: Response): string {
  const sessionId: unknown = res.locals.sessionId;
  if (typeof sessionId !== 'string') {
    throw new HttpError('Сессия не инициализирована', 500);
  }
  return sessionId;
}

export async function requireActiveDataset(storage: IStorage, res: Response): Promise<ActiveDataset> {
  const dataset = await storage.getActiveDataset(getSessionId(res));
  if (!dataset) {
    throw new NotFoundError('Данные не загружены. Загрузите файл или выберите демо-данные');
  }
  return dataset;
}

export function summarizeDataset(dataset: ActiveDataset): DatasetSummary {
  return {
    name: dataset.name,
    source: dataset.source,
    rowCount: dataset.table.rows.length,
    columns: dataset.table.columns.map((column) => ({ ...column })),
    loadedAt: dataset.loadedAt.toISOString(),
  };
}
