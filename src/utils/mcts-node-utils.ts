import type { MCTSNode } from '../mcts-node.js';
import { MCTSInvariantError } from '../errors.js';

export function calculateAvgScore<Action>(node: MCTSNode<Action>): number {
    return node.visits > 0 ? node.totalReward / node.visits : 0;
}

/**
 * Calculates the UCB1 (Upper Confidence Bound) score of a child.
 * UCB1 = exploitation + C * exploration = (total_reward / visits) + C * sqrt(2 * ln(parent_visits) / visits)
 *
 * The engine guarantees every selectable child has been backpropagated through
 * at least once; an unvisited child here means that guarantee was broken.
 */
export function getUCB1Score<Action>(parent: MCTSNode<Action>, child: MCTSNode<Action>, explorationConst: number): number {
    if (child.visits === 0) {
        throw new MCTSInvariantError('UCB1 score requested for an unvisited child');
    }

    const exploitation = calculateAvgScore(child);
    if (explorationConst === 0) {
        return exploitation;
    }

    const exploration = Math.sqrt(2 * Math.log(parent.visits) / child.visits);
    return exploitation + explorationConst * exploration;
}
