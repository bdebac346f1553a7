import { Router } from 'express';
import { createDivisionRoutes } from './divisionRoutes.js';
import { apiLimiter } from '../middleware/rateLimiter.js';
import type { DivisionService } from '../services/division/index.js';

export interface RouteDependencies {
  service: DivisionService;
  /** Resolves when the database answers, rejects otherwise */
  checkDatabase: () => Promise<void>;
}

export function createRoutes({ service, checkDatabase }: RouteDependencies): Router {
  const router = Router();

  // Health check
  router.get('/health', async (_req, res) => {
    try {
      await checkDatabase();
      res.json({ status: 'ok', database: 'connected', timestamp: new Date().toISOString() });
    } catch (err) {
      console.error('[health] Database check failed:', err instanceof Error ? err.message : err);
      res.status(503).json({ status: 'error', database: 'disconnected', timestamp: new Date().toISOString() });
    }
  });

  router.get('/api', (_req, res) => {
    res.json({ api: 'division-hierarchy', version: '1.0.0' });
  });

  router.use('/api/divisions', apiLimiter, createDivisionRoutes(service));

  return router;
}
