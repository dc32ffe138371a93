import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ACTIONS } from '../../rl/types';
import type { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';
import { ValidationError } from '../../utils/errors';
import { probePage } from '../../sensing/page-probe';

const featuresSchema = z.object({
  htmlSize: z.number().nonnegative().optional(),
  hasScripts: z.boolean().optional(),
  obstructions: z.object({
    captcha: z.boolean().optional(),
    spinner: z.boolean().optional(),
    loginWall: z.boolean().optional(),
  }).optional(),
  priorFailures: z.number().int().nonnegative().optional(),
});

const scrapeSchema = z.object({
  url: z.string().url(),
  features: featuresSchema.optional(),
  html: z.string().optional(),     // probed for features when none are given
  priorFailures: z.number().int().nonnegative().optional(),
  strategy: z.enum(ACTIONS).optional(),
  actions: z.array(z.enum(ACTIONS)).min(1).optional(),
});

export function createScrapeRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/scrape
   * Pick a strategy for the page, run it, learn from the outcome
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = scrapeSchema.parse(req.body);
      if (body.strategy && body.actions && !body.actions.includes(body.strategy)) {
        throw new ValidationError('strategy must be one of the listed actions', {
          strategy: body.strategy,
          actions: body.actions,
        });
      }

      const result = await services.policyEngine.scrape({
        url: body.url,
        features: body.features ??
          (body.html !== undefined ? probePage(body.html, { priorFailures: body.priorFailures }) : undefined),
        strategy: body.strategy,
        availableActions: body.actions,
      });

      res.json(apiResponse({
        episode: result.episode,
        content: result.content ?? null,
        estimateBefore: result.update.oldEstimate,
        estimateAfter: result.update.newEstimate,
      }));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/scrape/recommend
   * Best known strategy for the page, without running anything
   */
  router.post('/recommend', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = z.object({
        features: featuresSchema.default({}),
        actions: z.array(z.enum(ACTIONS)).min(1).optional(),
      }).parse(req.body);

      res.json(apiResponse(services.policyEngine.recommend(body.features, body.actions)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
