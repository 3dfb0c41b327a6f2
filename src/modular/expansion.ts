import type { MCTSNode } from '../mcts-node.js';
import { MCTSInvariantError } from '../errors.js';
import { type Random, randomChoice } from '../utils/random.js';
import type { ExpansionOrder } from './mcts-config.js';

export interface ExpansionStrategy<Action> {
    expand(node: MCTSNode<Action>): MCTSNode<Action>;
}

/**
 * MCTS Expansion Phase Implementation
 *
 * Takes the node selection stopped at and grows the tree by exactly one child,
 * chosen among the node's untried actions.
 *
 * PRECONDITION:
 * - node is not terminal and still has untried actions
 *   Anything else means the round logic is broken, so it fails loudly instead of
 *   silently returning the node.
 *
 * POSTCONDITION:
 * - the chosen action moved from node.untriedActions to node.children
 * - the returned child has zero statistics; the caller simulates from it and
 *   backpropagates before any later round can select it
 */
export class MCTSExpansion<Action> implements ExpansionStrategy<Action> {
    constructor(
        private rng: Random,
        private order: ExpansionOrder = 'random',
    ) {}

    expand(node: MCTSNode<Action>): MCTSNode<Action> {
        if (node.isTerminal) {
            throw new MCTSInvariantError('Should not expand a terminal node');
        }
        if (node.isExpanded) {
            throw new MCTSInvariantError('Should not expand a node that has already been fully expanded');
        }

        const action = this.order === 'sequential'
            ? node.untriedActions[0]
            : randomChoice(this.rng, node.untriedActions);

        return node.addChild(action);
    }
}
