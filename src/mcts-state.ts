/**
 * Domain capability interface.
 *
 * The engine knows nothing about the decision process it searches beyond what
 * this interface exposes. Implementations are value-like: executeAction must
 * return a new state and leave the receiver untouched, since the same state is
 * shared by a tree node and every rollout started from it.
 *
 * REWARD PERSPECTIVE:
 * The reward is read from a single fixed "reward subject" baked into the state
 * (e.g. "the black player"). The default backpropagation never flips its sign
 * between plies, so an adversarial domain has to encode the opponent's view in
 * its own reward computation, or opt into NegamaxBackpropagation.
 */
export interface MCTSState<Action> {
    /**
     * Actions available from this state. Must be non-empty unless isTerminal.
     */
    readonly possibleActions: readonly Action[];

    /**
     * Apply an action and return the resulting state.
     */
    executeAction(action: Action): MCTSState<Action>;

    readonly isTerminal: boolean;

    /**
     * Reward of this state from the reward subject's perspective. Only read on
     * terminal states by the default rollout and must be stable across reads.
     */
    readonly reward: number;
}

/**
 * Maps an action to a string that is equal for equal actions. Used both as
 * equality and as the hash key of a node's children.
 */
export type ActionKey<Action> = (action: Action) => string;

export const defaultActionKey: ActionKey<unknown> = action => JSON.stringify(action);
