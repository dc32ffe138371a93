import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';

const feedbackSchema = z.object({
  episodeId: z.string().min(1),
  rating: z.number().int().min(1).max(5),
  comments: z.string().max(2000).optional(),
});

export function createFeedbackRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/feedback
   * Rate the content an earlier scrape produced
   *
   * Request body: { episodeId: string; rating: 1-5; comments?: string }
   * 404 for an unknown episode, 409 if the episode was already rated
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = feedbackSchema.parse(req.body);
      const record = await services.applyFeedback(body);
      res.status(201).json(apiResponse(record));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
