/**
 * ServiceContainer - wires the policy components together
 * Manages lifecycle (load on start, save after each episode, flush on stop)
 */

import { ValueTable, ValueTableSnapshot } from '../rl/value-table';
import { EpsilonGreedyStrategy } from '../rl/exploration/epsilon-greedy';
import { RewardEvaluator } from '../rl/reward-evaluator';
import { Learner } from '../rl/learner';
import { StrategyPolicyEngine } from '../rl/policy-engine';
import { EpisodeLog, EpisodeLogSnapshot } from '../episodes/episode-log';
import { FeedbackProcessor, FeedbackRequest } from '../feedback/feedback-processor';
import {
  LoadReport,
  SnapshotStore,
  createEpisodeLogStore,
  createValueTableStore,
} from '../persistence/snapshot-store';
import { StrategyExecutor } from '../executor/types';
import type { FeedbackRecord } from '../rl/types';
import { AppConfig, getConfig, validateConfig } from '../utils/config';
import { RandomSource, defaultRandom } from '../utils/random';
import { createLogger } from '../utils/logger';

const logger = createLogger('ServiceContainer');

export interface ServiceOptions {
  executor: StrategyExecutor;
  config?: AppConfig;
  random?: RandomSource;
  /** Keep everything in memory (tests, dry runs) */
  persist?: boolean;
}

export interface InitializationReport {
  valueTable: LoadReport | null;
  episodeLog: LoadReport | null;
}

export class ServiceContainer {
  public readonly config: AppConfig;
  public readonly valueTable: ValueTable;
  public readonly exploration: EpsilonGreedyStrategy;
  public readonly rewardEvaluator: RewardEvaluator;
  public readonly learner: Learner;
  public readonly episodeLog: EpisodeLog;
  public readonly policyEngine: StrategyPolicyEngine;
  public readonly feedbackProcessor: FeedbackProcessor;

  private readonly valueTableStore: SnapshotStore<ValueTableSnapshot> | null;
  private readonly episodeLogStore: SnapshotStore<EpisodeLogSnapshot> | null;
  private initialized: boolean = false;

  constructor(options: ServiceOptions) {
    this.config = options.config ?? getConfig();
    validateConfig(this.config);
    const { rl, reward, persistence } = this.config;

    // Step 1: Value table and the components that read or write it
    this.valueTable = new ValueTable({ initialEstimate: rl.initialEstimate });
    this.exploration = new EpsilonGreedyStrategy(
      rl.epsilon,
      { epsilonDecay: rl.epsilonDecay, epsilonMin: rl.epsilonMin },
      options.random ?? defaultRandom
    );
    this.rewardEvaluator = new RewardEvaluator(reward);
    this.learner = new Learner(this.valueTable, rl.alpha);
    this.episodeLog = new EpisodeLog();

    // Step 2: Persistence
    const persist = options.persist ?? true;
    this.valueTableStore = persist
      ? createValueTableStore(this.valueTable, persistence.dataDir, persistence.valueTableFile)
      : null;
    this.episodeLogStore = persist
      ? createEpisodeLogStore(this.episodeLog, persistence.dataDir, persistence.episodeLogFile)
      : null;

    // Step 3: Scrape loop and feedback
    this.policyEngine = new StrategyPolicyEngine({
      valueTable: this.valueTable,
      exploration: this.exploration,
      rewardEvaluator: this.rewardEvaluator,
      learner: this.learner,
      episodeLog: this.episodeLog,
      executor: options.executor,
      persistence: { save: () => this.save() },
    });
    this.feedbackProcessor = new FeedbackProcessor(this.episodeLog, this.rewardEvaluator, this.learner);
  }

  /**
   * Load persisted state. Corrupt files are reported, not fatal.
   */
  public async initialize(): Promise<InitializationReport> {
    if (this.initialized) {
      return { valueTable: null, episodeLog: null };
    }

    logger.info('Initializing Scrapewise services...');
    const valueTable = this.valueTableStore ? await this.valueTableStore.load() : null;
    const episodeLog = this.episodeLogStore ? await this.episodeLogStore.load() : null;

    this.initialized = true;
    logger.info('Scrapewise services ready', {
      valueTableEntries: this.valueTable.size(),
      episodes: this.episodeLog.size(),
    });
    return { valueTable, episodeLog };
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Persist both snapshots. Skipped until initialize() has loaded what is on
   * disk, so an early save never overwrites the stored state.
   */
  public async save(): Promise<void> {
    if (!this.initialized) {
      logger.debug('Skipping save before initialization');
      return;
    }
    await Promise.all([this.valueTableStore?.save(), this.episodeLogStore?.save()]);
  }

  /**
   * Apply a human rating and persist the corrected state
   */
  public async applyFeedback(request: FeedbackRequest): Promise<FeedbackRecord> {
    const record = await this.feedbackProcessor.apply(request);
    try {
      await this.save();
    } catch (error) {
      // The correction is already applied in memory; the next save retries the write.
      logger.error('Failed to persist feedback', error, { episodeId: request.episodeId });
    }
    return record;
  }

  public async shutdown(): Promise<void> {
    await this.save();
    await Promise.all([this.valueTableStore?.flush(), this.episodeLogStore?.flush()]);
    logger.info('Scrapewise state flushed');
  }

  public getExplorationRate(): number {
    return this.exploration.getEpsilon();
  }
}

export const createServices = (options: ServiceOptions): ServiceContainer => new ServiceContainer(options);
