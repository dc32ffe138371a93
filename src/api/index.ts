import express, { Express, Router } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createRateLimiter } from './middleware/rate-limiter';
import { API_VERSION } from './middleware/response';
import { createScrapeRouter } from './routes/scrape';
import { createFeedbackRouter } from './routes/feedback';
import { createEpisodesRouter } from './routes/episodes';
import { createPolicyRouter } from './routes/policy';
import type { ServiceContainer } from '../services';

const DEFAULT_ORIGINS = ['http://localhost:3000'];

/**
 * Express app over a service container. Listening is left to the caller.
 */
export function createApp(services: ServiceContainer): Express {
  const app = express();

  app.use(
    helmet(),
    cors({ origin: process.env.ALLOWED_ORIGINS?.split(',') ?? DEFAULT_ORIGINS }),
    express.json({ limit: '1mb' }),
    compression(),
    requestLogger
  );
  app.use('/api', createRateLimiter(services.config.api.rateLimit));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      initialized: services.isInitialized(),
      timestamp: new Date().toISOString(),
    });
  });

  const v1 = Router();
  v1.use('/scrape', createScrapeRouter(services));
  v1.use('/feedback', createFeedbackRouter(services));
  v1.use('/episodes', createEpisodesRouter(services));
  v1.use(createPolicyRouter(services));
  app.use('/api/v1', v1);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
