import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import type { Env } from './infra/env.js';
import type { ConfigStore } from './infra/store/ConfigStore.js';
import { AuditRecorder } from './services/AuditRecorder.js';
import { ReferenceValidator } from './services/ReferenceValidator.js';
import { BackendService } from './services/BackendService.js';
import { RouteService } from './services/RouteService.js';
import { HistoryService } from './services/HistoryService.js';
import { createApiRouter } from './api/index.js';
import { createCorsOptions } from './api/corsOptions.js';
import { requestLogger } from './api/requestLogger.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { describeError, logger } from './infra/logger.js';

/**
 * Builds the express application around an already opened store.
 * Kept free of listen() so tests can drive it in process.
 */
export function createApp(env: Env, store: ConfigStore): Express {
  const audit = new AuditRecorder(store);
  const references = new ReferenceValidator(store);

  const backendService = new BackendService(store, audit);
  const routeService = new RouteService(store, audit, references);
  const historyService = new HistoryService(store);

  const app = express();

  app.use(cors(createCorsOptions(env)));
  app.use(express.json());
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Readiness endpoint
  app.get('/ready', async (_req: Request, res: Response) => {
    try {
      await store.ping();
      res.json({ status: 'ready' });
    } catch (error) {
      logger.warn('Readiness check failed', describeError(error));
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use('/api/v1', createApiRouter({ backendService, routeService, historyService }));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(createErrorHandler(env));

  return app;
}
