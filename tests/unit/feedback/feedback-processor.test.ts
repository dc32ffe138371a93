/**
 * FeedbackProcessor Tests
 */

import { FeedbackProcessor } from '../../../src/feedback/feedback-processor';
import { ScriptedExecutor, SMALL_PAGE, buildEngine, EngineFixture } from '../../helpers/fixtures';
import { ConflictError, NotFoundError, ValidationError } from '../../../src/utils/errors';
import { Episode } from '../../../src/rl/types';

describe('FeedbackProcessor', () => {
  let fixture: EngineFixture;
  let processor: FeedbackProcessor;
  let episode: Episode;

  beforeEach(async () => {
    fixture = buildEngine(new ScriptedExecutor({
      'static-fetch': { success: true, elapsedMs: 300, quality: 0.9 },
    }));
    processor = new FeedbackProcessor(fixture.episodeLog, fixture.rewardEvaluator, fixture.learner);
    ({ episode } = await fixture.engine.scrape({
      url: 'https://example.test/article',
      features: SMALL_PAGE,
      strategy: 'static-fetch',
    }));
  });

  it('should move the estimate by alpha times the reward revision', async () => {
    // Arrange
    const before = fixture.valueTable.get(episode.state, 'static-fetch');
    const revised = fixture.rewardEvaluator.evaluate({ success: true, elapsedMs: 300, quality: 0.9 }, 1);

    // Act
    const record = await processor.apply({ episodeId: episode.id, rating: 1, comments: 'wrong section' });

    // Assert
    const after = fixture.valueTable.get(episode.state, 'static-fetch');
    expect(record.previousReward).toBe(episode.reward);
    expect(record.reward).toBe(revised);
    expect(record.delta).toBe(revised - episode.reward);
    expect(record.estimateBefore).toBe(before.estimate);
    expect(after.estimate).toBeCloseTo(before.estimate + 0.1 * (revised - episode.reward), 12);
    expect(record.estimateAfter).toBe(after.estimate);
    expect(after.visits).toBe(before.visits);
    expect(record.comments).toBe('wrong section');
  });

  it('should raise the estimate for a high rating of a poor automatic score', async () => {
    const failing = buildEngine(new ScriptedExecutor({ 'heavy-render': new Error('blocked') }));
    const failProcessor = new FeedbackProcessor(failing.episodeLog, failing.rewardEvaluator, failing.learner);
    const { episode: failed } = await failing.engine.scrape({ url: 'https://example.test/x', strategy: 'heavy-render' });

    const record = await failProcessor.apply({ episodeId: failed.id, rating: 5 });

    expect(record.delta).toBeGreaterThan(0);
    expect(record.estimateAfter).toBeGreaterThan(record.estimateBefore);
  });

  it('should reject a second rating for the same episode', async () => {
    await processor.apply({ episodeId: episode.id, rating: 4 });
    const estimate = fixture.valueTable.estimate(episode.state, 'static-fetch');

    await expect(processor.apply({ episodeId: episode.id, rating: 2 })).rejects.toThrow(ConflictError);
    expect(fixture.valueTable.estimate(episode.state, 'static-fetch')).toBe(estimate);
    expect(fixture.episodeLog.allFeedback()).toHaveLength(1);
  });

  it('should reject concurrent ratings for the same episode', async () => {
    const results = await Promise.allSettled([
      processor.apply({ episodeId: episode.id, rating: 5 }),
      processor.apply({ episodeId: episode.id, rating: 1 }),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    expect(fixture.episodeLog.allFeedback()).toHaveLength(1);
  });

  it('should reject an unknown episode without touching the table', async () => {
    const size = fixture.valueTable.size();
    const snapshot = fixture.valueTable.snapshot();

    await expect(processor.apply({ episodeId: 'ep_unknown', rating: 3 })).rejects.toThrow(NotFoundError);
    expect(fixture.valueTable.size()).toBe(size);
    expect(fixture.valueTable.snapshot()).toEqual(snapshot);
  });

  it.each([0, 6, 3.5])('should reject rating %p', async (rating) => {
    await expect(processor.apply({ episodeId: episode.id, rating })).rejects.toThrow(ValidationError);
    expect(fixture.episodeLog.feedbackFor(episode.id)).toBeUndefined();
  });
});
