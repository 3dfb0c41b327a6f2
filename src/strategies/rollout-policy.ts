import type { MCTSState } from '../mcts-state.js';
import type { Random } from '../utils/random.js';

/**
 * Rollout (playout) Policy Interface
 *
 * A rollout plays a state forward to termination and reports how good the
 * reached outcome was. Any policy (uniform random, weighted, heuristic-filtered)
 * implements this interface and is injected into the search tree.
 *
 * CONTRACT:
 * - the input state is never mutated (states are value-like)
 * - the returned value is derived only from a terminal state's reward
 * - all randomness is drawn from `rng`
 */
export interface RolloutPolicy<Action> {
    rollout(state: MCTSState<Action>, rng: Random): number;
}
