export { StrategyPolicyEngine } from './policy-engine';
export type {
  ScrapeRequest,
  ScrapeResult,
  Recommendation,
  PolicyRow,
  EngineStats,
  PolicyPersistence,
  PolicyEngineDeps,
} from './policy-engine';
export { ValueTable, VALUE_TABLE_SCHEMA_VERSION } from './value-table';
export type { ValueTableSnapshot, ValueTableOptions } from './value-table';
export { PolicySelector } from './policy-selector';
export { RewardEvaluator, isHumanRating } from './reward-evaluator';
export { Learner } from './learner';
export { EpsilonGreedyStrategy } from './exploration/epsilon-greedy';
export { encodeState, describeState, bucketize, UNKNOWN } from './state-encoder';

export * from './types';
