import type { Action, Outcome } from '../rl/types';

/**
 * What a strategy runs against
 */
export interface ScrapeTarget {
  url: string;
}

/**
 * Runs one extraction strategy. Implemented outside this package (browser
 * automation, HTTP fetch). Should resolve with a failed Outcome rather than
 * throw, and should stop work when the signal aborts; the policy engine
 * converts anything it throws into a failed Outcome anyway.
 */
export interface StrategyExecutor {
  execute(action: Action, target: ScrapeTarget, signal: AbortSignal): Promise<Outcome>;
}
