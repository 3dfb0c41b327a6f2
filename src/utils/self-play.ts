import type { MCTSState } from '../mcts-state.js';
import type { MonteCarloSearchTree } from '../modular/mcts.js';

export interface SelfPlayOptions<Action> {
    /** Index into the trees array of the side to move in `state` */
    getPlayerIndex: (state: MCTSState<Action>) => number;

    /** Stop after this many committed moves even if the game is not over */
    maxMoves?: number;

    /** Formats an action for LOG_MCTS_MOVES output */
    describeAction?: (action: Action) => string;
}

export type SelfPlayMove<Action> = {
    player: number;
    action: Action;
};

export type SelfPlayResult<Action> = {
    finalState: MCTSState<Action>;
    moves: SelfPlayMove<Action>[];
    completed: boolean;
};

/**
 * Plays a game between search trees, one per side.
 *
 * Each turn, the tree of the side to move searches for one action, which is
 * committed to the real state and then reported to every tree through
 * updateRoot, so all of them keep searching from the real position and reuse
 * the subtree under the move actually played.
 *
 * Every tree must have been built from the same position as `initialState`
 * (possibly with a different reward subject or heuristics).
 */
export function playGame<Action>(
    initialState: MCTSState<Action>,
    trees: readonly MonteCarloSearchTree<Action>[],
    options: SelfPlayOptions<Action>,
): SelfPlayResult<Action> {
    const maxMoves = options.maxMoves ?? Infinity;
    const describe = options.describeAction ?? ((action: Action) => JSON.stringify(action));
    const moves: SelfPlayMove<Action>[] = [];
    let state = initialState;

    while (!state.isTerminal && moves.length < maxMoves) {
        const player = options.getPlayerIndex(state);
        const tree = trees[player];
        if (tree === undefined) {
            throw new Error(`No search tree for player ${player}`);
        }

        const actions = tree.searchForActions(1);
        if (actions.length === 0) {
            throw new Error(`Search tree for player ${player} returned no action in a non-terminal state`);
        }
        const action = actions[0];

        state = state.executeAction(action);
        for (const other of trees) {
            other.updateRoot(action);
        }
        moves.push({ player, action });

        if (process.env.LOG_MCTS_MOVES === 'true') {
            console.log(`[SELF-PLAY] move ${moves.length}: player ${player} plays ${describe(action)}`);
        }
    }

    return { finalState: state, moves, completed: state.isTerminal };
}
