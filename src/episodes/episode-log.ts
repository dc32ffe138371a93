/**
 * Episode Log
 *
 * Append-only record of every scrape attempt and every human rating applied
 * to one. Records are frozen on append; nothing is ever removed.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { ACTIONS, Action, Episode, FeedbackRecord, HumanRating } from '../rl/types';
import { DataCorruptionError } from '../utils/errors';

export const EPISODE_LOG_SCHEMA_VERSION = 1;

export interface EpisodeLogSnapshot {
  version: number;
  episodes: Episode[];
  feedback: FeedbackRecord[];
}

const ratingSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4), z.literal(5)]);

const episodeSchema = z.object({
  id: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  url: z.string(),
  state: z.string().min(1),
  action: z.enum(ACTIONS),
  forced: z.boolean(),
  explored: z.boolean(),
  outcome: z.object({
    success: z.boolean(),
    elapsedMs: z.number().finite().nonnegative(),
    quality: z.number().finite().nonnegative(),
    error: z.string().optional(),
    contentLength: z.number().int().nonnegative(),
  }),
  reward: z.number().finite(),
  qualityScore: z.number().finite(),
  estimate: z.number().finite(),
  visits: z.number().int().nonnegative(),
});

const feedbackSchema = z.object({
  id: z.string().min(1),
  episodeId: z.string().min(1),
  rating: ratingSchema,
  comments: z.string().optional(),
  previousReward: z.number().finite(),
  reward: z.number().finite(),
  delta: z.number().finite(),
  estimateBefore: z.number().finite(),
  estimateAfter: z.number().finite(),
  timestamp: z.number().int().nonnegative(),
});

const snapshotSchema = z.object({
  version: z.number().int(),
  episodes: z.array(episodeSchema),
  feedback: z.array(feedbackSchema),
});

export type NewEpisode = Omit<Episode, 'id' | 'timestamp'>;
export type NewFeedback = Omit<FeedbackRecord, 'id' | 'timestamp'>;

export interface PerformanceStats {
  totalScrapes: number;
  successRate: number;
  avgQuality: number;
  avgReward: number;
  feedbackCount: number;
  avgRating: number | null;
  byAction: Record<Action, { attempts: number; successes: number; avgReward: number }>;
}

export class EpisodeLog {
  private episodes: Episode[] = [];
  private byId: Map<string, Episode> = new Map();
  private feedback: FeedbackRecord[] = [];
  private feedbackByEpisode: Map<string, FeedbackRecord> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  append(episode: NewEpisode): Episode {
    const record: Episode = Object.freeze({
      ...episode,
      outcome: Object.freeze({ ...episode.outcome }),
      id: `ep_${uuidv4()}`,
      timestamp: this.now(),
    });
    this.episodes.push(record);
    this.byId.set(record.id, record);
    return record;
  }

  get(episodeId: string): Episode | undefined {
    return this.byId.get(episodeId);
  }

  /**
   * Most recent episodes, oldest first
   */
  recent(limit: number = 20): Episode[] {
    const start = Math.max(0, this.episodes.length - limit);
    return this.episodes.slice(start);
  }

  all(): readonly Episode[] {
    return this.episodes;
  }

  size(): number {
    return this.episodes.length;
  }

  recordFeedback(feedback: NewFeedback): FeedbackRecord {
    const record: FeedbackRecord = Object.freeze({
      ...feedback,
      id: `fb_${uuidv4()}`,
      timestamp: this.now(),
    });
    this.feedback.push(record);
    this.feedbackByEpisode.set(record.episodeId, record);
    return record;
  }

  feedbackFor(episodeId: string): FeedbackRecord | undefined {
    return this.feedbackByEpisode.get(episodeId);
  }

  allFeedback(): readonly FeedbackRecord[] {
    return this.feedback;
  }

  stats(): PerformanceStats {
    const emptyRow = () => ({ attempts: 0, successes: 0, avgReward: 0 });
    const byAction: PerformanceStats['byAction'] = {
      'heavy-render': emptyRow(),
      'light-render': emptyRow(),
      'wait-render': emptyRow(),
      'static-fetch': emptyRow(),
    };

    let successes = 0;
    let qualitySum = 0;
    let rewardSum = 0;
    for (const episode of this.episodes) {
      const row = byAction[episode.action];
      row.attempts++;
      row.avgReward += episode.reward;
      if (episode.outcome.success) {
        successes++;
        row.successes++;
      }
      qualitySum += episode.qualityScore;
      rewardSum += episode.reward;
    }
    for (const row of Object.values(byAction)) {
      row.avgReward = row.attempts > 0 ? row.avgReward / row.attempts : 0;
    }

    const total = this.episodes.length;
    const ratingSum = this.feedback.reduce((sum, record) => sum + record.rating, 0);

    return {
      totalScrapes: total,
      successRate: total > 0 ? successes / total : 0,
      avgQuality: total > 0 ? qualitySum / total : 0,
      avgReward: total > 0 ? rewardSum / total : 0,
      feedbackCount: this.feedback.length,
      avgRating: this.feedback.length > 0 ? ratingSum / this.feedback.length : null,
      byAction,
    };
  }

  snapshot(): EpisodeLogSnapshot {
    return {
      version: EPISODE_LOG_SCHEMA_VERSION,
      episodes: [...this.episodes],
      feedback: [...this.feedback],
    };
  }

  /**
   * Replace the log from a snapshot, all or nothing
   */
  restore(snapshot: unknown): void {
    const parsed = snapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new DataCorruptionError('Episode log snapshot failed schema validation', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    if (parsed.data.version !== EPISODE_LOG_SCHEMA_VERSION) {
      throw new DataCorruptionError(
        `Unsupported episode log version ${parsed.data.version} (expected ${EPISODE_LOG_SCHEMA_VERSION})`
      );
    }

    const byId = new Map<string, Episode>();
    const episodes: Episode[] = [];
    for (const raw of parsed.data.episodes) {
      if (byId.has(raw.id)) {
        throw new DataCorruptionError(`Duplicate episode id ${raw.id}`);
      }
      const episode: Episode = Object.freeze({ ...raw, outcome: Object.freeze(raw.outcome) });
      byId.set(episode.id, episode);
      episodes.push(episode);
    }

    const feedbackByEpisode = new Map<string, FeedbackRecord>();
    const feedback: FeedbackRecord[] = [];
    for (const raw of parsed.data.feedback) {
      if (!byId.has(raw.episodeId)) {
        throw new DataCorruptionError(`Feedback ${raw.id} references unknown episode ${raw.episodeId}`);
      }
      if (feedbackByEpisode.has(raw.episodeId)) {
        throw new DataCorruptionError(`Episode ${raw.episodeId} has more than one rating`);
      }
      const rating: HumanRating = raw.rating;
      const record: FeedbackRecord = Object.freeze({ ...raw, rating });
      feedbackByEpisode.set(record.episodeId, record);
      feedback.push(record);
    }

    this.episodes = episodes;
    this.byId = byId;
    this.feedback = feedback;
    this.feedbackByEpisode = feedbackByEpisode;
  }
}
