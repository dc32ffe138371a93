import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ScrapewiseError, ValidationError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { ApiResponse, apiFailure } from './response';

const logger = createLogger('API');

const exposeInternals = () => process.env.NODE_ENV === 'development';

/**
 * Map what a route threw onto a ScrapewiseError, or null if it is not one we
 * recognise.
 */
function classify(err: unknown): ScrapewiseError | null {
  if (err instanceof ScrapewiseError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new ValidationError('Invalid request', {
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  // body-parser: malformed JSON, oversized body
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    return new ScrapewiseError(err.message, 'BAD_REQUEST', err.status);
  }
  return null;
}

export function notFoundHandler(req: Request, res: Response<ApiResponse<null>>): void {
  res.status(404).json(apiFailure('NOT_FOUND', `Route not found: ${req.method} ${req.path}`));
}

/**
 * Last middleware in the chain. Client errors carry their details; server
 * errors only do in development.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response<ApiResponse<null>>,
  _next: NextFunction
): void {
  const known = classify(err);

  if (!known) {
    logger.error(`${req.method} ${req.path} failed`, err);
    res.status(500).json(apiFailure(
      'INTERNAL_ERROR',
      exposeInternals() ? err.message : 'An unexpected error occurred',
      exposeInternals() ? err.stack : undefined
    ));
    return;
  }

  if (known.statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed`, known);
  } else {
    logger.debug(`${req.method} ${req.path} rejected`, { code: known.code });
  }

  const details = known.statusCode < 500 || exposeInternals() ? known.details : undefined;
  res.status(known.statusCode).json(apiFailure(known.code, known.message, details));
}
