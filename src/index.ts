export * from './rl';
export { EpisodeLog, EPISODE_LOG_SCHEMA_VERSION } from './episodes/episode-log';
export type { EpisodeLogSnapshot, PerformanceStats } from './episodes/episode-log';
export { FeedbackProcessor } from './feedback/feedback-processor';
export type { FeedbackRequest } from './feedback/feedback-processor';
export { runStrategy, withTimeBudget, normalizeOutcome, CANCELLED, TIMED_OUT } from './executor/run-strategy';
export type { StrategyExecutor, ScrapeTarget } from './executor/types';
export { probePage } from './sensing/page-probe';
export { JsonFileStore } from './persistence/file-store';
export {
  SnapshotStore,
  createValueTableStore,
  createEpisodeLogStore,
} from './persistence/snapshot-store';
export type { LoadReport, LoadStatus } from './persistence/snapshot-store';
export { ServiceContainer, createServices } from './services';
export type { ServiceOptions, InitializationReport } from './services';
export { createApp } from './api';
export { startServer } from './server';
export { CONFIG, getConfig, validateConfig } from './utils/config';
export type { AppConfig, RLConfig, RewardConfig } from './utils/config';
export { seededRandom, defaultRandom } from './utils/random';
export type { RandomSource } from './utils/random';
export * from './utils/errors';
