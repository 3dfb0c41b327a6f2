import type { MCTSNode } from '../mcts-node.js';

/**
 * How a simulation result is written back into the tree.
 */
export interface BackpropagationStrategy<Action> {
    /**
     * @param node - The node the simulation started from
     * @param reward - The value the rollout returned
     */
    backpropagate(node: MCTSNode<Action>, reward: number): void;
}

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Walks from the simulated node up through parent references to the root,
 * inclusive, and at each node:
 * - increments visits
 * - adds the reward to totalReward
 *
 * FIXED REWARD PERSPECTIVE:
 * The reward is never negated on the way up. It is measured for the single
 * reward subject the domain state carries (e.g. the player the tree plays for),
 * so an adversarial domain has to fold the opponent's view into its own reward.
 * Use NegamaxBackpropagation when that is not the case.
 */
export class MCTSBackpropagation<Action> implements BackpropagationStrategy<Action> {
    backpropagate(node: MCTSNode<Action>, reward: number): void {
        let current: MCTSNode<Action> | undefined = node;

        while (current !== undefined) {
            current.visits++;
            current.totalReward += reward;
            current = current.parent;
        }
    }
}

/**
 * Negamax backpropagation for strictly alternating two-player domains.
 *
 * The reward must be measured for the player who made the move into the
 * simulated node. It is credited as is to that node, then negated at every
 * ply while ascending, so each node's statistics are seen from the player who
 * made the move into it. Rewards are expected to be symmetric around 0
 * (e.g. +1 win, -1 loss, 0 draw).
 */
export class NegamaxBackpropagation<Action> implements BackpropagationStrategy<Action> {
    backpropagate(node: MCTSNode<Action>, reward: number): void {
        let current: MCTSNode<Action> | undefined = node;
        let currentReward = reward;

        while (current !== undefined) {
            current.visits++;
            current.totalReward += currentReward;
            currentReward = -currentReward;
            current = current.parent;
        }
    }
}
