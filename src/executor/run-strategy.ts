/**
 * Executor plumbing: every way a strategy can go wrong ends as a failed
 * Outcome so the learner always gets a reward signal.
 */

import { ScrapeTarget, StrategyExecutor } from './types';
import { Action, Outcome } from '../rl/types';
import { ExecutorFailure, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Executor');

export const CANCELLED = 'cancelled';
export const TIMED_OUT = 'timeout';

/**
 * Clamp an executor's report into a valid Outcome
 */
export function normalizeOutcome(outcome: Outcome, measuredMs: number): Outcome {
  const elapsedMs = Number.isFinite(outcome.elapsedMs) && outcome.elapsedMs >= 0
    ? outcome.elapsedMs
    : Math.max(0, measuredMs);
  const quality = outcome.success && Number.isFinite(outcome.quality) && outcome.quality > 0
    ? outcome.quality
    : 0;

  const normalized: Outcome = { success: outcome.success === true, elapsedMs, quality };
  if (typeof outcome.content === 'string') {
    normalized.content = outcome.content;
  }
  if (outcome.error !== undefined) {
    normalized.error = outcome.error;
  }
  return normalized;
}

export function failedOutcome(elapsedMs: number, error: string): Outcome {
  return { success: false, elapsedMs: Math.max(0, elapsedMs), quality: 0, error };
}

/**
 * Run a strategy and always come back with an Outcome
 */
export async function runStrategy(
  executor: StrategyExecutor,
  action: Action,
  target: ScrapeTarget,
  signal?: AbortSignal,
  now: () => number = Date.now
): Promise<Outcome> {
  const started = now();

  if (signal?.aborted) {
    return failedOutcome(0, CANCELLED);
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  const cancelled = new Promise<Outcome>((resolve) => {
    controller.signal.addEventListener(
      'abort',
      () => resolve(failedOutcome(now() - started, CANCELLED)),
      { once: true }
    );
  });

  try {
    const execution = executor
      .execute(action, target, controller.signal)
      .then((outcome) => normalizeOutcome(outcome, now() - started));
    return await Promise.race([execution, cancelled]);
  } catch (error) {
    const failure = new ExecutorFailure(`Strategy ${action} failed for ${target.url}`, {
      cause: errorMessage(error),
    });
    logger.warn(failure.message, failure.details);
    return failedOutcome(now() - started, errorMessage(error));
  } finally {
    signal?.removeEventListener('abort', onAbort);
    // Tell a still-running executor to stop; its late result is ignored.
    controller.abort();
  }
}

/**
 * Wrap an executor so every call reports within budgetMs. On expiry the
 * inner executor is aborted and a failed Outcome with error "timeout" is
 * returned.
 */
export function withTimeBudget(
  executor: StrategyExecutor,
  budgetMs: number,
  now: () => number = Date.now
): StrategyExecutor {
  return {
    async execute(action, target, signal) {
      const started = now();
      const controller = new AbortController();
      const onAbort = () => controller.abort(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });

      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<Outcome>((resolve) => {
        timer = setTimeout(() => {
          controller.abort(TIMED_OUT);
          resolve(failedOutcome(now() - started, TIMED_OUT));
        }, budgetMs);
      });

      try {
        return await Promise.race([executor.execute(action, target, controller.signal), expired]);
      } finally {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
      }
    },
  };
}
