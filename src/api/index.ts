import { Router } from 'express';
import { createBackendRouter } from './backendRoutes.js';
import { createRouteRouter } from './routeRoutes.js';
import { createHistoryRouter } from './historyRoutes.js';
import type { BackendService } from '../services/BackendService.js';
import type { RouteService } from '../services/RouteService.js';
import type { HistoryService } from '../services/HistoryService.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from createApp
 */
export function createApiRouter(deps: {
  backendService: BackendService;
  routeService: RouteService;
  historyService: HistoryService;
}): Router {
  const router = Router();

  router.use('/backends', createBackendRouter(deps.backendService));
  router.use('/routes', createRouteRouter(deps.routeService));
  router.use('/history', createHistoryRouter(deps.historyService));

  return router;
}
