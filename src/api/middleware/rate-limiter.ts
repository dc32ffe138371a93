import { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { apiFailure } from './response';

/**
 * Per-IP limit on API requests over a one minute window
 */
export function createRateLimiter(limitPerMinute: number): RequestHandler {
  return rateLimit({
    windowMs: 60_000,
    limit: limitPerMinute,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json(apiFailure('RATE_LIMIT_EXCEEDED', 'Too many requests. Please try again later.', {
        limit: limitPerMinute,
        windowMs: 60_000,
      }));
    },
  });
}
