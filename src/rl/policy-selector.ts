import { ValueTable } from './value-table';
import { EpsilonGreedyStrategy } from './exploration/epsilon-greedy';
import { Action, Selection, State } from './types';
import { InvalidStateError } from '../utils/errors';

/**
 * Epsilon-greedy selection over the value table.
 * Exploitation breaks ties by the table's action declaration order.
 */
export class PolicySelector {
  constructor(
    private readonly valueTable: ValueTable,
    private readonly exploration: EpsilonGreedyStrategy
  ) {}

  select(state: State, availableActions: readonly Action[]): Selection {
    const candidates = this.validate(availableActions);

    if (this.exploration.shouldExplore()) {
      const action = this.exploration.selectRandom(candidates);
      return { action, explored: true, estimate: this.valueTable.estimate(state, action) };
    }

    return { ...this.greedy(state, candidates), explored: false };
  }

  /**
   * Best known action for a state, no exploration
   */
  greedy(state: State, availableActions: readonly Action[]): { action: Action; estimate: number } {
    const candidates = this.validate(availableActions);
    let bestAction = candidates[0];
    let bestEstimate = this.valueTable.estimate(state, bestAction);

    for (const action of candidates.slice(1)) {
      const estimate = this.valueTable.estimate(state, action);
      if (estimate > bestEstimate) {
        bestAction = action;
        bestEstimate = estimate;
      }
    }

    return { action: bestAction, estimate: bestEstimate };
  }

  /**
   * Rejects empty or foreign action sets and returns the candidates in
   * declaration order with duplicates removed.
   */
  private validate(availableActions: readonly Action[]): Action[] {
    if (availableActions.length === 0) {
      throw new InvalidStateError('Cannot select a strategy from an empty action set');
    }

    const unknown = availableActions.filter((action) => !this.valueTable.actions.includes(action));
    if (unknown.length > 0) {
      throw new InvalidStateError('Action set contains strategies outside the configured enumeration', {
        unknown,
      });
    }

    return this.valueTable.actions.filter((action) => availableActions.includes(action));
  }
}
