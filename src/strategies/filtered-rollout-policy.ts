import type { MCTSState } from '../mcts-state.js';
import type { Random } from '../utils/random.js';
import { type RandomRolloutOptions, RandomRolloutPolicy } from './random-rollout-policy.js';

/**
 * Narrows the actions a playout may choose from, e.g. to moves next to pieces
 * already on the board.
 */
export type ActionFilter<Action> = (state: MCTSState<Action>, actions: readonly Action[]) => readonly Action[];

/**
 * Filtered Rollout Policy
 *
 * Random playout restricted by a domain-supplied filter. When the filter leaves
 * nothing to choose, the full action list is used so the playout can still
 * reach a terminal state.
 */
export class FilteredRolloutPolicy<Action> extends RandomRolloutPolicy<Action> {
    constructor(
        private filter: ActionFilter<Action>,
        options: RandomRolloutOptions<Action> = {},
    ) {
        super(options);
    }

    protected override chooseAction(state: MCTSState<Action>, actions: readonly Action[], rng: Random): Action {
        const filtered = this.filter(state, actions);
        return super.chooseAction(state, filtered.length > 0 ? filtered : actions, rng);
    }
}
