import type { MCTSNode } from '../mcts-node.js';
import { calculateAvgScore } from './mcts-node-utils.js';

/**
 * Renders one line per node, children indented under their parent, e.g.
 * `  [0] action={"x":1,"y":1}: visits=12, avg=0.5833, children=3`
 */
export const formatTree = <Action>(node: MCTSNode<Action>, maxDepth: number = Infinity): string[] => {
    const lines: string[] = [];
    const visit = (current: MCTSNode<Action>, depth: number, prefix: string, label: string): void => {
        const indent = '  '.repeat(depth);
        const avgReward = calculateAvgScore(current);
        lines.push(`${indent}${prefix}${label}: visits=${current.visits}, avg=${avgReward.toFixed(4)}, children=${current.children.size}`);
        if (depth + 1 >= maxDepth) {
            return;
        }
        let idx = 0;
        for (const [ key, child ] of current.children) {
            visit(child.node, depth + 1, `[${idx}] `, `action=${key}`);
            idx++;
        }
    };
    visit(node, 0, '', 'ROOT');
    return lines;
};

export const printTree = <Action>(node: MCTSNode<Action>, maxDepth: number = Infinity): void => {
    for (const line of formatTree(node, maxDepth)) {
        console.log(line);
    }
};

/**
 * Build the path from the root to a given node, returning a readable string.
 * @returns String like `{"x":1,"y":1} → {"x":0,"y":2}`
 */
export const getNodePath = <Action>(node: MCTSNode<Action>): string => {
    const keys: string[] = [];
    let current: MCTSNode<Action> | undefined = node;

    while (current?.parent !== undefined && current.lastAction !== undefined) {
        keys.unshift(current.actionKey(current.lastAction));
        current = current.parent;
    }

    return keys.join(' → ');
};
