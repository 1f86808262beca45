import type { Express } from 'express';
import { createServer, type Server } from 'http';
import { storage as defaultStorage, type IStorage } from '../storage';
import { apiRateLimit, helmetConfig, suspiciousActivityDetection } from '../utils/security';
import { sessionMiddleware } from '../utils/session';
import { registerAnalyticsRoutes } from './analytics';
import { registerDatasetRoutes } from './datasets';

export function registerRoutes(app: Express, storage: IStorage = defaultStorage): Server {
  app.use(helmetConfig);
  app.use(suspiciousActivityDetection);
  app.use('/api', apiRateLimit);
  app.use('/api', sessionMiddleware);

  app.get('/api/health', async (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime(), sessions: await storage.countSessions() });
  });

  registerDatasetRoutes(app, storage);
  registerAnalyticsRoutes(app, storage);

  const httpServer = createServer(app);

  return httpServer;
}
