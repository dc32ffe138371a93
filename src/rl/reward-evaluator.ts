import { CONFIG, RewardConfig } from '../utils/config';
import { ValidationError } from '../utils/errors';
import { HumanRating, Outcome, RewardBreakdown } from './types';

export const isHumanRating = (value: unknown): value is HumanRating => {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5;
};

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Scores an outcome as a single reward. Pure: identical inputs give the
 * identical reward.
 *
 *   automatic = success ? successReward - latency + quality
 *                       : failurePenalty - latency
 *   latency   = latencyWeight * t / (t + latencyScaleMs)
 *   quality   = qualityWeight * min(1, q / qualityScale)
 *   human     = feedbackScale * (rating - 3) / 2
 *   reward    = (1 - feedbackWeight) * automatic + feedbackWeight * human
 */
export class RewardEvaluator {
  private readonly weights: RewardConfig;

  constructor(weights: Partial<RewardConfig> = {}) {
    this.weights = { ...CONFIG.reward, ...weights };
  }

  evaluate(outcome: Outcome, rating?: number): number {
    return this.breakdown(outcome, rating).reward;
  }

  breakdown(outcome: Outcome, rating?: number): RewardBreakdown {
    if (rating !== undefined && !isHumanRating(rating)) {
      throw new ValidationError('Rating must be an integer from 1 to 5', { rating });
    }

    const w = this.weights;
    const elapsed = nonNegative(outcome.elapsedMs);
    const successTerm = outcome.success ? w.successReward : w.failurePenalty;
    const latencyPenalty = w.latencyWeight * (elapsed / (elapsed + w.latencyScaleMs));
    const qualityTerm = outcome.success ? w.qualityWeight * this.normalizeQuality(outcome.quality) : 0;
    const automatic = successTerm - latencyPenalty + qualityTerm;

    if (rating === undefined) {
      return { successTerm, latencyPenalty, qualityTerm, automatic, human: null, reward: automatic };
    }

    const human = w.feedbackScale * ((rating - 3) / 2);
    const reward = (1 - w.feedbackWeight) * automatic + w.feedbackWeight * human;
    return { successTerm, latencyPenalty, qualityTerm, automatic, human, reward };
  }

  /**
   * Quality proxy mapped onto [0, 1]
   */
  normalizeQuality(quality: number): number {
    return Math.min(1, nonNegative(quality) / this.weights.qualityScale);
  }

  /**
   * 1-5 star estimate of how usable the extracted content is
   */
  scoreQuality(outcome: Outcome): number {
    if (!outcome.success) {
      return 1.0;
    }

    let score = 1.0 + 4.0 * this.normalizeQuality(outcome.quality);
    const elapsed = nonNegative(outcome.elapsedMs);
    if (elapsed > 15_000) {
      score -= 1.0;
    } else if (elapsed < 5_000) {
      score += 0.5;
    }

    return Math.max(1.0, Math.min(5.0, score));
  }

  getWeights(): Readonly<RewardConfig> {
    return this.weights;
  }
}
