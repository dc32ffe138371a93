/**
 * Scrapewise Configuration
 *
 * Central configuration for policy hyperparameters, reward weights,
 * persistence locations and the HTTP surface.
 */

import { ConfigurationError } from './errors';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Reinforcement Learning Hyperparameters
   */
  rl: {
    alpha: 0.1,              // Learning rate (0 to 1]
    epsilon: 0.2,            // Exploration rate [0 to 1]
    epsilonDecay: 1.0,       // Multiplier per episode (1.0 = no decay)
    epsilonMin: 0.05,        // Floor for the decay schedule
    initialEstimate: 0.0,    // Neutral prior for unseen (state, action) pairs
  },

  /**
   * Reward Function Weights
   *
   * Any success scores at least successReward - latencyWeight (0.7), any
   * failure at most failurePenalty (-1.0).
   */
  reward: {
    successReward: 1.0,
    failurePenalty: -1.0,
    latencyWeight: 0.3,      // Upper bound of the latency penalty
    latencyScaleMs: 5000,    // Elapsed time at which half the penalty applies
    qualityWeight: 0.5,      // Upper bound of the quality bonus
    qualityScale: 1.0,       // Quality proxy value that earns the full bonus
    feedbackWeight: 0.7,     // Share of the blended reward given to a human rating
    feedbackScale: 1.5,      // Magnitude of a 5-star (or 1-star) rating
  },

  /**
   * Persistence Configuration
   */
  persistence: {
    dataDir: process.env.DATA_DIR || './data',
    valueTableFile: 'value-table.json',
    episodeLogFile: 'episodes.json',
  },

  /**
   * API Server Configuration
   */
  api: {
    port: 3000,
    rateLimit: 100,          // Requests per minute per IP
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.NODE_ENV !== 'production',
  },
};

export type AppConfig = typeof CONFIG;
export type RLConfig = AppConfig['rl'];
export type RewardConfig = AppConfig['reward'];

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${name} must be a number`, { value: raw });
  }
  return parsed;
}

/**
 * Environment-specific configuration overrides
 */
export const getConfig = (): AppConfig => {
  const config: AppConfig = {
    ...CONFIG,
    rl: {
      ...CONFIG.rl,
      alpha: envNumber('RL_ALPHA', CONFIG.rl.alpha),
      epsilon: envNumber('RL_EPSILON', CONFIG.rl.epsilon),
      epsilonDecay: envNumber('RL_EPSILON_DECAY', CONFIG.rl.epsilonDecay),
      epsilonMin: envNumber('RL_EPSILON_MIN', CONFIG.rl.epsilonMin),
    },
    persistence: {
      ...CONFIG.persistence,
      dataDir: process.env.DATA_DIR || CONFIG.persistence.dataDir,
    },
    api: {
      ...CONFIG.api,
      port: Math.trunc(envNumber('API_PORT', CONFIG.api.port)),
    },
  };

  validateConfig(config);
  return config;
};

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: AppConfig): void => {
  const { rl, reward } = config;

  if (!(rl.alpha > 0 && rl.alpha <= 1)) {
    throw new ConfigurationError('RL alpha must be in (0, 1]', { alpha: rl.alpha });
  }
  if (!(rl.epsilon >= 0 && rl.epsilon <= 1)) {
    throw new ConfigurationError('RL epsilon must be in [0, 1]', { epsilon: rl.epsilon });
  }
  if (!(rl.epsilonDecay > 0 && rl.epsilonDecay <= 1)) {
    throw new ConfigurationError('RL epsilonDecay must be in (0, 1]', { epsilonDecay: rl.epsilonDecay });
  }
  if (!(rl.epsilonMin >= 0 && rl.epsilonMin <= 1)) {
    throw new ConfigurationError('RL epsilonMin must be in [0, 1]', { epsilonMin: rl.epsilonMin });
  }
  if (!Number.isFinite(rl.initialEstimate)) {
    throw new ConfigurationError('RL initialEstimate must be finite');
  }

  const positive: Array<keyof RewardConfig> = [
    'successReward',
    'latencyWeight',
    'latencyScaleMs',
    'qualityWeight',
    'qualityScale',
    'feedbackScale',
  ];
  for (const key of positive) {
    if (!(reward[key] > 0)) {
      throw new ConfigurationError(`Reward ${key} must be positive`, { [key]: reward[key] });
    }
  }
  if (!(reward.failurePenalty < 0)) {
    throw new ConfigurationError('Reward failurePenalty must be negative');
  }
  // A success must outscore a failure whatever the latency and quality terms.
  if (reward.successReward - reward.latencyWeight <= reward.failurePenalty) {
    throw new ConfigurationError('Latency penalty can outweigh the success term');
  }
  // A human rating must be able to override the automatic signal.
  if (!(reward.feedbackWeight > 0.5 && reward.feedbackWeight <= 1)) {
    throw new ConfigurationError('Reward feedbackWeight must be in (0.5, 1]', {
      feedbackWeight: reward.feedbackWeight,
    });
  }

  if (config.api.port < 1 || config.api.port > 65535) {
    throw new ConfigurationError('API port must be between 1 and 65535');
  }
};
