import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { HistoryService } from '../services/HistoryService.js';
import { toConfigHistoryJson } from '../domain/entities/ConfigHistory.js';
import { parseHistoryQuery } from './requestParams.js';

/**
 * Configuration history route handler
 */
export function createHistoryRouter(historyService: HistoryService): Router {
  const router = Router();

  /**
   * GET /api/v1/history?config_type=backend&config_id=1&limit=10&offset=0
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await historyService.listHistory(parseHistoryQuery(req.query));
      res.json({
        items: result.items.map(toConfigHistoryJson),
        total: result.total,
        limit: result.limit,
        offset: result.offset,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
