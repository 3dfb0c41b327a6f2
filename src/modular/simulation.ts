import type { MCTSNode } from '../mcts-node.js';
import type { Random } from '../utils/random.js';
import type { RolloutPolicy } from '../strategies/rollout-policy.js';
import { RandomRolloutPolicy } from '../strategies/random-rollout-policy.js';

/**
 * MCTS Simulation Phase Implementation
 *
 * Estimates the value of a freshly expanded node (or of the node selection
 * stopped at, when the depth cap forbids expansion) by running the configured
 * rollout policy from its state.
 *
 * The node's state is handed over as is: rollouts only ever call executeAction,
 * which returns new states, so the tree's copy is never advanced.
 *
 * A terminal node simulates to its own reward without playing any move.
 */
export class MCTSSimulation<Action> {
    constructor(
        private rng: Random,
        private rolloutPolicy: RolloutPolicy<Action> = new RandomRolloutPolicy<Action>(),
    ) {}

    simulate(node: MCTSNode<Action>): number {
        return this.rolloutPolicy.rollout(node.state, this.rng);
    }
}
