import type { MCTSNode } from '../mcts-node.js';
import { MCTSInvariantError } from '../errors.js';
import { getUCB1Score } from '../utils/mcts-node-utils.js';
import { type Random, randomChoice } from '../utils/random.js';

export interface SelectionStrategy<Action> {
    select(root: MCTSNode<Action>, maxTreeDepth: number): MCTSNode<Action>;
    selectBestChild(node: MCTSNode<Action>, explorationConst: number): { action: Action, node: MCTSNode<Action> };
}

/**
 * MCTS Selection Phase Implementation
 *
 * Descends from the root through nodes that are already fully expanded, at each
 * level following the child with the highest UCB1 score:
 *
 *     score(c) = mean(c) + C * sqrt(2 * ln(visits(parent)) / visits(c))
 *
 * Exact ties are broken uniformly at random rather than by enumeration order, so
 * equally good children receive equal attention.
 *
 * PRECONDITION (selectBestChild):
 * - node has at least one child and every child has visits > 0
 *   (the round structure guarantees this: a node only becomes fully expanded once
 *   each of its children was created by expansion and backpropagated through)
 *
 * STOPPING RULES (select):
 * - the node still has untried actions (expansion opportunity)
 * - the node is terminal
 * - the depth cap is reached
 */
export class MCTSSelection<Action> implements SelectionStrategy<Action> {
    constructor(
        private rng: Random,
        private explorationConst: number = 1.0,
    ) {}

    /**
     * Walks down from `root` and returns the node a round should expand or
     * simulate from.
     *
     * @param root - Current root of the search tree (depth 1)
     * @param maxTreeDepth - Nodes at this depth are not descended through
     */
    select(root: MCTSNode<Action>, maxTreeDepth: number): MCTSNode<Action> {
        let current = root;
        while (current.isExpanded && !current.isTerminal && current.depth < maxTreeDepth) {
            current = this.selectBestChild(current, this.explorationConst).node;
        }
        return current;
    }

    /**
     * Selects the child with the highest UCB1 score, choosing uniformly among
     * exact ties.
     *
     * @param explorationConst - 0 yields pure exploitation (used for action extraction)
     * @returns The winning action and its child node
     */
    selectBestChild(node: MCTSNode<Action>, explorationConst: number): { action: Action, node: MCTSNode<Action> } {
        if (node.children.size === 0) {
            throw new MCTSInvariantError('selectBestChild called on a node without children');
        }

        let bestScore = -Infinity;
        let best: { action: Action, node: MCTSNode<Action> }[] = [];

        for (const entry of node.children.values()) {
            const score = getUCB1Score(node, entry.node, explorationConst);
            if (score > bestScore) {
                bestScore = score;
                best = [ entry ];
            } else if (score === bestScore) {
                best.push(entry);
            }
        }

        if (best.length === 0) {
            // Every score was NaN: a domain returned a NaN reward
            throw new MCTSInvariantError('No child has a comparable UCB1 score');
        }

        const { action, node: child } = randomChoice(this.rng, best);
        return { action, node: child };
    }
}
