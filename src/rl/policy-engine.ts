import { ValueTable } from './value-table';
import { PolicySelector } from './policy-selector';
import { EpsilonGreedyStrategy } from './exploration/epsilon-greedy';
import { RewardEvaluator } from './reward-evaluator';
import { Learner } from './learner';
import { StateBuckets, describeState, encodeState } from './state-encoder';
import { EpisodeLog, PerformanceStats } from '../episodes/episode-log';
import { StrategyExecutor } from '../executor/types';
import { runStrategy } from '../executor/run-strategy';
import { Action, Episode, PageFeatures, PolicyUpdate, Selection, State, ValueEntry } from './types';
import { InvalidStateError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('PolicyEngine');

export interface ScrapeRequest {
  url: string;
  features?: PageFeatures;
  availableActions?: readonly Action[];
  strategy?: Action;         // bypass selection, still learn from the result
  signal?: AbortSignal;
}

export interface ScrapeResult {
  episode: Episode;
  content?: string;
  update: PolicyUpdate;
}

export interface Recommendation {
  state: State;
  action: Action;
  estimate: number;
  visits: number;
}

export interface PolicyRow {
  state: State;
  /** Null for keys that do not parse, e.g. from an older encoder */
  buckets: StateBuckets | null;
  best: Action;
  entries: Array<{ action: Action } & ValueEntry>;
}

export interface EngineStats extends PerformanceStats {
  valueTableSize: number;
  statesSeen: number;
  explorationRate: number;
  learningRate: number;
}

/**
 * Anything that can write the engine's state somewhere durable
 */
export interface PolicyPersistence {
  save(): Promise<void>;
}

export interface PolicyEngineDeps {
  valueTable: ValueTable;
  exploration: EpsilonGreedyStrategy;
  rewardEvaluator: RewardEvaluator;
  learner: Learner;
  episodeLog: EpisodeLog;
  executor: StrategyExecutor;
  persistence?: PolicyPersistence;
}

/**
 * One scrape = encode → select → execute → evaluate → learn → log → persist
 */
export class StrategyPolicyEngine {
  private readonly valueTable: ValueTable;
  private readonly exploration: EpsilonGreedyStrategy;
  private readonly selector: PolicySelector;
  private readonly rewardEvaluator: RewardEvaluator;
  private readonly learner: Learner;
  private readonly episodeLog: EpisodeLog;
  private readonly executor: StrategyExecutor;
  private readonly persistence?: PolicyPersistence;

  constructor(deps: PolicyEngineDeps) {
    this.valueTable = deps.valueTable;
    this.exploration = deps.exploration;
    this.selector = new PolicySelector(deps.valueTable, deps.exploration);
    this.rewardEvaluator = deps.rewardEvaluator;
    this.learner = deps.learner;
    this.episodeLog = deps.episodeLog;
    this.executor = deps.executor;
    this.persistence = deps.persistence;
  }

  async scrape(request: ScrapeRequest): Promise<ScrapeResult> {
    const state = encodeState(request.features);
    const actions = request.availableActions ?? this.valueTable.actions;
    const selection = this.choose(state, actions, request.strategy);

    logger.debug('Selected strategy', { url: request.url, state, ...selection });

    const outcome = await runStrategy(
      this.executor,
      selection.action,
      { url: request.url },
      request.signal
    );
    const reward = this.rewardEvaluator.evaluate(outcome);
    const qualityScore = this.rewardEvaluator.scoreQuality(outcome);
    const update = await this.learner.learn(state, selection.action, reward);

    const episode = this.episodeLog.append({
      url: request.url,
      state,
      action: selection.action,
      forced: request.strategy !== undefined,
      explored: selection.explored,
      outcome: {
        success: outcome.success,
        elapsedMs: outcome.elapsedMs,
        quality: outcome.quality,
        error: outcome.error,
        contentLength: outcome.content?.length ?? 0,
      },
      reward,
      qualityScore,
      estimate: update.newEstimate,
      visits: update.visits,
    });

    this.exploration.decay();

    logger.info('Scrape episode recorded', {
      episodeId: episode.id,
      url: request.url,
      action: episode.action,
      success: outcome.success,
      reward,
      estimate: update.newEstimate,
    });

    await this.persist();

    return { episode, content: outcome.content, update };
  }

  /**
   * Greedy choice for a page, without exploring or touching the table
   */
  recommend(features: PageFeatures = {}, actions: readonly Action[] = this.valueTable.actions): Recommendation {
    const state = encodeState(features);
    const best = this.selector.greedy(state, actions);
    return {
      state,
      action: best.action,
      estimate: best.estimate,
      visits: this.valueTable.peek(state, best.action)?.visits ?? 0,
    };
  }

  policy(): PolicyRow[] {
    return this.valueTable.states().map((state) => ({
      state,
      buckets: describeState(state),
      best: this.selector.greedy(state, this.valueTable.actions).action,
      entries: this.valueTable.stateActions(state),
    }));
  }

  getStats(): EngineStats {
    return {
      ...this.episodeLog.stats(),
      valueTableSize: this.valueTable.size(),
      statesSeen: this.valueTable.states().length,
      explorationRate: this.exploration.getEpsilon(),
      learningRate: this.learner.getAlpha(),
    };
  }

  private choose(state: State, actions: readonly Action[], forced?: Action): Selection {
    if (forced === undefined) {
      return this.selector.select(state, actions);
    }
    if (!actions.includes(forced) || !this.valueTable.actions.includes(forced)) {
      throw new InvalidStateError(`Forced strategy ${forced} is not in the available action set`, {
        available: actions,
      });
    }
    return { action: forced, explored: false, estimate: this.valueTable.estimate(state, forced) };
  }

  private async persist(): Promise<void> {
    if (!this.persistence) {
      return;
    }
    try {
      await this.persistence.save();
    } catch (error) {
      // The episode is already applied in memory; the next save retries the write.
      logger.error('Failed to persist policy state', error);
    }
  }
}
