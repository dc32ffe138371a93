import { Router, Request, Response } from 'express';
import type { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';

export function createPolicyRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /api/v1/policy
   * Learned estimates per state and the strategy each state currently prefers
   */
  router.get('/policy', (req: Request, res: Response) => {
    res.json(apiResponse({
      actions: services.valueTable.actions,
      states: services.policyEngine.policy(),
    }));
  });

  /**
   * GET /api/v1/stats
   */
  router.get('/stats', (req: Request, res: Response) => {
    res.json(apiResponse(services.policyEngine.getStats()));
  });

  return router;
}
