import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { RouteService } from '../services/RouteService.js';
import { toRouteJson } from '../domain/entities/Route.js';
import { getOperator, parseEnabledFilter, parseRouteId } from './requestParams.js';

/**
 * Gateway route handler
 */
export function createRouteRouter(routeService: RouteService): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const enabled = parseEnabledFilter(req.query.enabled);
      const routes = await routeService.listRoutes(enabled);
      res.json(routes.map(toRouteJson));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const route = await routeService.getRoute(parseRouteId(req.params.id));
      res.json(toRouteJson(route));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const route = await routeService.createRoute(req.body, { operator: getOperator(req) });
      res.status(201).json(toRouteJson(route));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseRouteId(req.params.id);
      const route = await routeService.updateRoute(id, req.body, { operator: getOperator(req) });
      res.json(toRouteJson(route));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await routeService.deleteRoute(parseRouteId(req.params.id), { operator: getOperator(req) });
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
