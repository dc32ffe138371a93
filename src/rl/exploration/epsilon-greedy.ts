import { RandomSource, defaultRandom, randomIndex } from '../../utils/random';

export interface EpsilonSchedule {
  epsilonDecay: number;  // multiplier per decay() call, 1.0 disables decay
  epsilonMin: number;
}

export class EpsilonGreedyStrategy {
  private epsilon: number;
  private readonly minEpsilon: number;
  private readonly decayRate: number;

  constructor(
    initialEpsilon: number,
    schedule: EpsilonSchedule = { epsilonDecay: 1, epsilonMin: 0 },
    private readonly random: RandomSource = defaultRandom
  ) {
    this.epsilon = initialEpsilon;
    this.decayRate = schedule.epsilonDecay;
    // The floor never lifts epsilon above where it started.
    this.minEpsilon = Math.min(schedule.epsilonMin, initialEpsilon);
  }

  shouldExplore(): boolean {
    return this.random() < this.epsilon;
  }

  selectRandom<T>(actions: readonly T[]): T {
    return actions[randomIndex(this.random, actions.length)];
  }

  /**
   * One step of the schedule; epsilon never increases.
   */
  decay(): void {
    this.epsilon = Math.max(this.minEpsilon, this.epsilon * this.decayRate);
  }

  getEpsilon(): number {
    return this.epsilon;
  }
}
