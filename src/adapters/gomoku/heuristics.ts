import type { ActionFilter } from '../../strategies/filtered-rollout-policy.js';
import { type GomokuAction, GomokuState } from './state.js';

/**
 * Rollout filter keeping only moves next to a stone already on the board.
 * Non-gomoku states pass through unchanged.
 */
export const gomokuNeighbourhoodFilter: ActionFilter<GomokuAction> = (state, actions) => {
    if (!(state instanceof GomokuState)) {
        return actions;
    }
    return actions.filter(action => state.hasAdjacentStone(action.row, action.col));
};
