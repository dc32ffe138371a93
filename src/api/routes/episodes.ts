import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';
import { NotFoundError } from '../../utils/errors';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

export function createEpisodesRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /api/v1/episodes?limit=20
   * Most recent episodes, newest first
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = listQuerySchema.parse(req.query);
      const episodes = services.episodeLog.recent(limit).reverse();
      res.json(apiResponse({ episodes, total: services.episodeLog.size() }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/episodes/:id
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const episode = services.episodeLog.get(req.params.id);
      if (!episode) {
        throw new NotFoundError('Episode', req.params.id);
      }
      res.json(apiResponse({
        episode,
        feedback: services.episodeLog.feedbackFor(episode.id) ?? null,
      }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
