/**
 * Core types of the strategy-selection policy
 */

/**
 * Extraction strategies, in tie-break order
 */
export const ACTIONS = ['heavy-render', 'light-render', 'wait-render', 'static-fetch'] as const;

export type Action = (typeof ACTIONS)[number];

export const isAction = (value: unknown): value is Action => {
  return ACTIONS.some((action) => action === value);
};

/**
 * Opaque state key produced by the state encoder
 */
export type State = string;

export interface ObstructionFlags {
  captcha?: boolean;
  spinner?: boolean;
  loginWall?: boolean;
}

/**
 * Observable signals about the page to be scraped. Every field is optional;
 * missing values land in the "unknown" bucket.
 */
export interface PageFeatures {
  htmlSize?: number;        // bytes, known or estimated
  hasScripts?: boolean;
  obstructions?: ObstructionFlags;
  priorFailures?: number;   // failed attempts for this URL in the current session
}

export interface ValueEntry {
  estimate: number;
  visits: number;
  lastUpdated: number;
}

/**
 * Result of running one strategy against one page
 */
export interface Outcome {
  success: boolean;
  elapsedMs: number;        // >= 0
  quality: number;          // content-quality proxy, >= 0
  content?: string;
  error?: string;
}

/** Integer star rating 1..5 */
export type HumanRating = 1 | 2 | 3 | 4 | 5;

export interface Selection {
  action: Action;
  explored: boolean;
  estimate: number;
}

export interface PolicyUpdate {
  state: State;
  action: Action;
  oldEstimate: number;
  newEstimate: number;
  reward: number;
  visits: number;
}

export interface RewardBreakdown {
  successTerm: number;
  latencyPenalty: number;
  qualityTerm: number;
  automatic: number;
  human: number | null;
  reward: number;
}

/**
 * One scrape attempt. Frozen once appended to the episode log.
 */
export interface Episode {
  readonly id: string;
  readonly timestamp: number;
  readonly url: string;
  readonly state: State;
  readonly action: Action;
  readonly forced: boolean;
  readonly explored: boolean;
  readonly outcome: Readonly<Omit<Outcome, 'content'>> & { readonly contentLength: number };
  readonly reward: number;
  readonly qualityScore: number;
  readonly estimate: number;
  readonly visits: number;
}

/**
 * Late-arriving human rating for an episode. Frozen once recorded.
 */
export interface FeedbackRecord {
  readonly id: string;
  readonly episodeId: string;
  readonly rating: HumanRating;
  readonly comments?: string;
  readonly previousReward: number;
  readonly reward: number;
  readonly delta: number;
  readonly estimateBefore: number;
  readonly estimateAfter: number;
  readonly timestamp: number;
}
