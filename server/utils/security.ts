import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import type { NextFunction, Request, Response } from 'express';
import { config } from '../config';
import { log } from '../logger';

// Логируем режим rate limiting при запуске
if (!config.isProduction) {
  log('🔓 Rate limiting отключен вне production', 'security');
}

// Общий rate limiting для API (только в production)
export const apiRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 минут
  limit: config.rateLimitMax,
  message: {
    error: 'Слишком много запросов. Попробуйте позже.',
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.isProduction,
});

// Загрузка и генерация тяжелее остальных запросов
export const heavyRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: Math.max(1, Math.floor(config.rateLimitMax / 5)),
  message: {
    error: 'Слишком много загрузок. Попробуйте через минуту.',
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.isProduction,
});

// API отдаёт только JSON и CSV, поэтому политика строгая
export const helmetConfig = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-site' },
});

/**
 * Пишет в лог запросы, которые похожи на автоматический сбор данных.
 */
export function suspiciousActivityDetection(req: Request, _res: Response, next: NextFunction) {
  const userAgent = req.get('User-Agent') ?? '';
  const suspiciousPatterns = [/bot/i, /crawler/i, /spider/i, /scraper/i];

  if (suspiciousPatterns.some((pattern) => pattern.test(userAgent))) {
    log(`[SECURITY WARNING] ${req.method} ${req.path} from ${req.ip ?? 'unknown'} (UA: ${userAgent})`, 'security');
  }

  next();
}
