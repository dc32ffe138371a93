/**
 * Shared test doubles
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { StrategyExecutor, ScrapeTarget } from '../../src/executor/types';
import { Action, Outcome } from '../../src/rl/types';
import { ValueTable } from '../../src/rl/value-table';
import { EpsilonGreedyStrategy } from '../../src/rl/exploration/epsilon-greedy';
import { RewardEvaluator } from '../../src/rl/reward-evaluator';
import { Learner } from '../../src/rl/learner';
import { EpisodeLog } from '../../src/episodes/episode-log';
import { PolicyPersistence, StrategyPolicyEngine } from '../../src/rl/policy-engine';
import { AppConfig, CONFIG } from '../../src/utils/config';
import { seededRandom } from '../../src/utils/random';

/**
 * Executor that replays a fixed outcome (or throws a fixed error) per action
 */
export class ScriptedExecutor implements StrategyExecutor {
  public readonly calls: Array<{ action: Action; url: string }> = [];

  constructor(private readonly script: Partial<Record<Action, Outcome | Error>>) {}

  async execute(action: Action, target: ScrapeTarget): Promise<Outcome> {
    this.calls.push({ action, url: target.url });
    const scripted = this.script[action];
    if (scripted === undefined) {
      return { success: false, elapsedMs: 0, quality: 0, error: `no script for ${action}` };
    }
    if (scripted instanceof Error) {
      throw scripted;
    }
    return { ...scripted };
  }
}

export interface EngineFixture {
  engine: StrategyPolicyEngine;
  valueTable: ValueTable;
  exploration: EpsilonGreedyStrategy;
  rewardEvaluator: RewardEvaluator;
  learner: Learner;
  episodeLog: EpisodeLog;
}

export function buildEngine(
  executor: StrategyExecutor,
  options: { epsilon?: number; alpha?: number; epsilonDecay?: number; epsilonMin?: number; persistence?: PolicyPersistence } = {}
): EngineFixture {
  const valueTable = new ValueTable();
  const exploration = new EpsilonGreedyStrategy(
    options.epsilon ?? 0,
    { epsilonDecay: options.epsilonDecay ?? 1, epsilonMin: options.epsilonMin ?? 0 },
    seededRandom(7)
  );
  const rewardEvaluator = new RewardEvaluator();
  const learner = new Learner(valueTable, options.alpha ?? 0.1);
  const episodeLog = new EpisodeLog();
  const engine = new StrategyPolicyEngine({
    valueTable,
    exploration,
    rewardEvaluator,
    learner,
    episodeLog,
    executor,
    persistence: options.persistence,
  });
  return { engine, valueTable, exploration, rewardEvaluator, learner, episodeLog };
}

export function testConfig(dataDir: string, rl: Partial<AppConfig['rl']> = {}): AppConfig {
  return {
    ...CONFIG,
    rl: { ...CONFIG.rl, epsilon: 0, ...rl },
    persistence: { ...CONFIG.persistence, dataDir },
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'scrapewise-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export const SMALL_PAGE = {
  htmlSize: 12_000,
  hasScripts: false,
  obstructions: {},
  priorFailures: 0,
};
