/**
 * Scrapewise errors
 *
 * Contract violations inside the engine surface as ScrapewiseError
 * subclasses. A strategy that fails to scrape is not one of them: that
 * becomes a failed Outcome and a low reward.
 */

export class ScrapewiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/** Malformed request or rating (400) */
export class ValidationError extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/** Unknown episode or other record (404) */
export class NotFoundError extends ScrapewiseError {
  constructor(resource: string, id?: string) {
    super(id === undefined ? `${resource} not found` : `${resource} '${id}' not found`, 'NOT_FOUND', 404, {
      resource,
      id,
    });
  }
}

/** Second rating for an already rated episode (409) */
export class ConflictError extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/** Selection over an empty or inconsistent action set */
export class InvalidStateError extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_STATE', 500, details);
  }
}

/** Persisted snapshot that fails schema or version checks */
export class DataCorruptionError extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATA_CORRUPTION', 500, details);
  }
}

export class ConfigurationError extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
  }
}

/**
 * A strategy could not retrieve content (502). Only ever logged and recorded
 * on the outcome; the engine does not rethrow it.
 */
export class ExecutorFailure extends ScrapewiseError {
  constructor(message: string, details?: unknown) {
    super(message, 'EXECUTOR_FAILURE', 502, details);
  }
}

export const isScrapewiseError = (error: unknown): error is ScrapewiseError => error instanceof ScrapewiseError;

/**
 * Normalise any thrown value into a ScrapewiseError
 */
export const handleError = (error: unknown): ScrapewiseError => {
  if (isScrapewiseError(error)) {
    return error;
  }
  const originalError = error instanceof Error ? error.name : String(error);
  const message = error instanceof Error ? error.message : 'An unknown error occurred';
  return new ScrapewiseError(message, 'UNKNOWN_ERROR', 500, { originalError });
};

// Shape check: fs errors under Jest come from another realm and fail instanceof Error
export const errorMessage = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
};
