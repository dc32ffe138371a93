/**
 * Feedback Processor
 *
 * Applies a late-arriving human rating to an episode that has already been
 * learned from. The rating revises the episode's reward, and the estimate
 * moves by alpha times the revision instead of taking a second full step.
 */

import { EpisodeLog } from '../episodes/episode-log';
import { Learner } from '../rl/learner';
import { RewardEvaluator, isHumanRating } from '../rl/reward-evaluator';
import type { FeedbackRecord } from '../rl/types';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('FeedbackProcessor');

export interface FeedbackRequest {
  episodeId: string;
  rating: number;
  comments?: string;
}

export class FeedbackProcessor {
  // Episodes whose rating is being applied right now
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly episodeLog: EpisodeLog,
    private readonly rewardEvaluator: RewardEvaluator,
    private readonly learner: Learner
  ) {}

  /**
   * One rating per episode; a second one is rejected with ConflictError.
   * Unknown episodes are rejected with NotFoundError and change nothing.
   */
  async apply(request: FeedbackRequest): Promise<FeedbackRecord> {
    const { episodeId, rating, comments } = request;

    if (!isHumanRating(rating)) {
      throw new ValidationError('Rating must be an integer from 1 to 5', { rating });
    }

    const episode = this.episodeLog.get(episodeId);
    if (!episode) {
      throw new NotFoundError('Episode', episodeId);
    }

    if (this.inFlight.has(episodeId) || this.episodeLog.feedbackFor(episodeId)) {
      throw new ConflictError(`Episode ${episodeId} has already been rated`, { episodeId });
    }

    this.inFlight.add(episodeId);
    try {
      const reward = this.rewardEvaluator.evaluate(
        {
          success: episode.outcome.success,
          elapsedMs: episode.outcome.elapsedMs,
          quality: episode.outcome.quality,
        },
        rating
      );
      const delta = reward - episode.reward;
      const update = await this.learner.correct(episode.state, episode.action, delta);

      const record = this.episodeLog.recordFeedback({
        episodeId,
        rating,
        comments,
        previousReward: episode.reward,
        reward,
        delta,
        estimateBefore: update.oldEstimate,
        estimateAfter: update.newEstimate,
      });

      logger.info('Applied feedback', {
        episodeId,
        rating,
        action: episode.action,
        delta,
        estimate: update.newEstimate,
      });

      return record;
    } finally {
      this.inFlight.delete(episodeId);
    }
  }
}
