import { ValueTable } from './value-table';
import { KeyedLock } from '../utils/keyed-lock';
import { Action, PolicyUpdate, State } from './types';

/**
 * Incremental value update with a fixed step size:
 *   new = old + alpha * (reward - old)
 *
 * Updates to one (state, action) key run under a per-key lock and read,
 * compute and write without yielding in between.
 */
export class Learner {
  private readonly locks = new KeyedLock();

  constructor(
    private readonly valueTable: ValueTable,
    private readonly alpha: number
  ) {}

  async learn(state: State, action: Action, reward: number): Promise<PolicyUpdate> {
    return this.locks.withLock(this.lockKey(state, action), () => {
      const oldEstimate = this.valueTable.get(state, action).estimate;
      const newEstimate = oldEstimate + this.alpha * (reward - oldEstimate);
      const entry = this.valueTable.update(state, action, newEstimate);
      return { state, action, oldEstimate, newEstimate, reward, visits: entry.visits };
    });
  }

  /**
   * Shift an estimate by alpha * rewardDelta after a reward was revised.
   * Does not count as a visit.
   */
  async correct(state: State, action: Action, rewardDelta: number): Promise<PolicyUpdate> {
    return this.locks.withLock(this.lockKey(state, action), () => {
      const oldEstimate = this.valueTable.get(state, action).estimate;
      const newEstimate = oldEstimate + this.alpha * rewardDelta;
      const entry = this.valueTable.adjust(state, action, newEstimate);
      return { state, action, oldEstimate, newEstimate, reward: rewardDelta, visits: entry.visits };
    });
  }

  getAlpha(): number {
    return this.alpha;
  }

  private lockKey(state: State, action: Action): string {
    return `${state}::${action}`;
  }
}
