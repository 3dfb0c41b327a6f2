import type { MCTSState } from '../mcts-state.js';
import { type Random, randomChoice, weightedChoice } from '../utils/random.js';
import type { RolloutPolicy } from './rollout-policy.js';

export interface RandomRolloutOptions<Action> {
    /**
     * Optional action weighting.
     * Lets a domain make some actions less likely in random playouts
     * (e.g. weight 0.2 on a pass move). Default weight is 1.0.
     */
    getActionWeight?: (action: Action, state: MCTSState<Action>) => number;

    /**
     * Upper bound on playout length. A domain that can cycle forever should set
     * this; exceeding it throws because no terminal reward was reached.
     */
    maxSteps?: number;
}

/**
 * Random Rollout Policy
 *
 * The default simulation: from the given state, pick an action uniformly at
 * random among possibleActions (or proportionally to getActionWeight when
 * supplied), apply it, and repeat until a terminal state is reached.
 */
export class RandomRolloutPolicy<Action> implements RolloutPolicy<Action> {
    constructor(private options: RandomRolloutOptions<Action> = {}) {}

    rollout(state: MCTSState<Action>, rng: Random): number {
        const maxSteps = this.options.maxSteps ?? Infinity;
        let current = state;
        let steps = 0;

        while (!current.isTerminal) {
            if (steps >= maxSteps) {
                throw new Error(`Rollout did not reach a terminal state within ${maxSteps} steps`);
            }
            current = current.executeAction(this.chooseAction(current, current.possibleActions, rng));
            steps++;
        }

        return current.reward;
    }

    protected chooseAction(state: MCTSState<Action>, actions: readonly Action[], rng: Random): Action {
        const getActionWeight = this.options.getActionWeight;
        if (getActionWeight) {
            return weightedChoice(rng, actions, action => getActionWeight(action, state));
        }
        return randomChoice(rng, actions);
    }
}
