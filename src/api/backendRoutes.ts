import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { BackendService } from '../services/BackendService.js';
import { toBackendJson } from '../domain/entities/Backend.js';
import { getOperator, parseEnabledFilter } from './requestParams.js';

/**
 * Backend route handler
 * HTTP layer decodes the request and delegates to BackendService
 */
export function createBackendRouter(backendService: BackendService): Router {
  const router = Router();

  /**
   * GET /api/v1/backends?enabled=true
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const enabled = parseEnabledFilter(req.query.enabled);
      const backends = await backendService.listBackends(enabled);
      res.json(backends.map(toBackendJson));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/backends/:name
   */
  router.get('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const backend = await backendService.getBackend(req.params.name);
      res.json(toBackendJson(backend));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/backends
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const backend = await backendService.createBackend(req.body, { operator: getOperator(req) });
      res.status(201).json(toBackendJson(backend));
    } catch (error) {
      next(error);
    }
  });

  /**
   * PUT /api/v1/backends/:name - partial update, omitted fields keep their values
   */
  router.put('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const backend = await backendService.updateBackend(req.params.name, req.body, {
        operator: getOperator(req),
      });
      res.json(toBackendJson(backend));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/v1/backends/:name - soft delete
   */
  router.delete('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await backendService.deleteBackend(req.params.name, { operator: getOperator(req) });
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
