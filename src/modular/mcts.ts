import { type ActionKey, type MCTSState, defaultActionKey } from '../mcts-state.js';
import { MCTSNode } from '../mcts-node.js';
import { MCTSConfigurationError } from '../errors.js';
import { type Random, createRandom } from '../utils/random.js';
import { calculateAvgScore } from '../utils/mcts-node-utils.js';
import { printTree } from '../utils/tree-debug.js';
import type { RolloutPolicy } from '../strategies/rollout-policy.js';
import { type BackpropagationStrategy, MCTSBackpropagation } from './backpropagation.js';
import { MCTSSimulation } from './simulation.js';
import { type ExpansionStrategy, MCTSExpansion } from './expansion.js';
import { type SelectionStrategy, MCTSSelection } from './selection.js';
import { type MCTSConfig, resolveMCTSConfig } from './mcts-config.js';

/**
 * Replaceable pieces of the search. Anything omitted falls back to the
 * UCB1 / random expansion / random rollout / fixed-perspective defaults,
 * all sharing one generator seeded from config.seed.
 */
export interface MCTSPolicies<Action> {
    rng?: Random;
    actionKey?: ActionKey<Action>;
    selection?: SelectionStrategy<Action>;
    expansion?: ExpansionStrategy<Action>;
    rolloutPolicy?: RolloutPolicy<Action>;
    backpropagation?: BackpropagationStrategy<Action>;
}

export interface SearchOptions {
    /** Checked between rounds; an aborted search extracts from what was built so far */
    signal?: AbortSignal;
}

export type ActionStatistics<Action> = {
    action: Action;
    score: number;
    visits: number;
};

/**
 * Monte Carlo Search Tree
 *
 * Owns a search tree rooted at the current real-world state and runs sampling
 * rounds over it. The caller owns the domain loop: it asks for actions, commits
 * one in the real domain, and reports it back through updateRoot so the subtree
 * under that action is reused for the next decision.
 *
 * ROUND:
 * 1. SELECTION: descend with UCB1 (C = explorationConst) while the node is fully
 *    expanded, not terminal and shallower than maxTreeDepth
 * 2. EXPANSION: materialise one untried action, unless the node is terminal or
 *    at the depth cap (then the node itself is simulated)
 * 3. SIMULATION: roll out from the new leaf's state
 * 4. BACKPROPAGATION: credit the reward from the leaf up to the root
 */
export class MonteCarloSearchTree<Action> {
    readonly config: MCTSConfig;

    private rootNode: MCTSNode<Action>;

    private selection: SelectionStrategy<Action>;

    private expansion: ExpansionStrategy<Action>;

    private simulation: MCTSSimulation<Action>;

    private backpropagation: BackpropagationStrategy<Action>;

    private roundsInLastSearch = 0;

    constructor(
        initialState: MCTSState<Action>,
        config: Partial<MCTSConfig> = {},
        policies: MCTSPolicies<Action> = {},
    ) {
        this.config = resolveMCTSConfig(config);

        const rng = policies.rng ?? createRandom(this.config.seed);
        this.selection = policies.selection ?? new MCTSSelection(rng, this.config.explorationConst);
        this.expansion = policies.expansion ?? new MCTSExpansion(rng, this.config.expansionOrder);
        this.simulation = new MCTSSimulation(rng, policies.rolloutPolicy);
        this.backpropagation = policies.backpropagation ?? new MCTSBackpropagation();

        this.rootNode = new MCTSNode(initialState, policies.actionKey ?? defaultActionKey);
    }

    get root(): MCTSNode<Action> {
        return this.rootNode;
    }

    /** Rounds actually run by the latest searchForActions call */
    get lastSearchRounds(): number {
        return this.roundsInLastSearch;
    }

    /**
     * Performs selection, expansion, simulation and backpropagation with one sample.
     */
    executeRound(): void {
        const selectedNode = this.selection.select(this.rootNode, this.config.maxTreeDepth);

        const simulationNode = !selectedNode.isTerminal && selectedNode.depth < this.config.maxTreeDepth
            ? this.expansion.expand(selectedNode)
            : selectedNode;

        let reward: number;
        try {
            reward = this.simulation.simulate(simulationNode);
        } catch (error) {
            // A child nobody backpropagated through must not stay selectable
            if (simulationNode !== selectedNode) {
                selectedNode.discardChild(simulationNode);
            }
            throw error;
        }

        this.backpropagation.backpropagate(simulationNode, reward);
    }

    /**
     * Runs the sample budget from the current root, then reads off the best
     * actions.
     *
     * @param searchDepth - How many consecutive actions are wanted
     * @returns Up to searchDepth actions; empty when the root is terminal
     */
    searchForActions(searchDepth: number = 1, options: SearchOptions = {}): Action[] {
        if (!Number.isInteger(searchDepth) || searchDepth < 1) {
            throw new MCTSConfigurationError(`The search depth must be a positive integer, got ${searchDepth}`);
        }

        const deadline = this.config.timeLimitMs !== undefined ? Date.now() + this.config.timeLimitMs : undefined;

        this.roundsInLastSearch = 0;
        for (let i = 0; i < this.config.samples; i++) {
            if (options.signal?.aborted) {
                break;
            }
            if (deadline !== undefined && Date.now() >= deadline) {
                break;
            }
            this.executeRound();
            this.roundsInLastSearch++;
        }

        this.logSearchResult();

        return this.config.extraction === 'lookahead'
            ? this.extractLookaheadActions(searchDepth)
            : this.extractGreedyActions(searchDepth);
    }

    /**
     * Moves the root to the child reached by an action committed in the real
     * domain. An explored child keeps all its statistics; an unexplored one is
     * created first. Every sibling subtree is dropped with the old root.
     */
    updateRoot(action: Action): this {
        const newRoot = this.rootNode.getChild(action) ?? this.rootNode.addChild(action);
        this.rootNode.removeChild(newRoot);
        this.rootNode = newRoot;
        return this;
    }

    /**
     * Root actions with their mean reward and visit count, best score first.
     */
    getActionStatistics(): ActionStatistics<Action>[] {
        const result = [ ...this.rootNode.children.values() ].map(child => ({
            action: child.action,
            score: calculateAvgScore(child.node),
            visits: child.node.visits,
        }));

        return result.sort((a, b) => b.score - a.score);
    }

    private extractGreedyActions(searchDepth: number): Action[] {
        const actions: Action[] = [];
        let current = this.rootNode;

        for (let i = 0; i < searchDepth; i++) {
            if (current.isTerminal || current.children.size === 0) {
                break;
            }
            const { action, node } = this.selection.selectBestChild(current, 0);
            actions.push(action);
            current = node;
        }

        return actions;
    }

    private extractLookaheadActions(searchDepth: number): Action[] {
        if (this.rootNode.isTerminal) {
            return [];
        }
        return this.lookahead(this.rootNode, searchDepth).actions;
    }

    /**
     * Exhaustive walk over the already built tree. Returns the action path,
     * at most `pliesLeft` long, whose deepest reached node has the highest mean
     * reward. The first path found wins ties.
     */
    private lookahead(node: MCTSNode<Action>, pliesLeft: number): { actions: Action[], score: number } {
        if (pliesLeft === 0 || node.isTerminal || node.children.size === 0) {
            return { actions: [], score: calculateAvgScore(node) };
        }

        let best: { actions: Action[], score: number } | undefined;
        for (const { action, node: child } of node.children.values()) {
            if (child.visits === 0) {
                continue;
            }
            const result = this.lookahead(child, pliesLeft - 1);
            if (best === undefined || result.score > best.score) {
                best = { actions: [ action, ...result.actions ], score: result.score };
            }
        }

        return best ?? { actions: [], score: calculateAvgScore(node) };
    }

    private logSearchResult(): void {
        if (process.env.DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(this.rootNode);
        }

        if (process.env.LOG_MCTS_SCORES === 'true') {
            const actions = this.getActionStatistics();
            console.log(`[MCTS] ${actions.length} actions evaluated over ${this.roundsInLastSearch} rounds:`);
            actions.slice(0, 5).forEach((a, i) => {
                const key = this.rootNode.actionKey(a.action);
                console.log(`  ${i + 1}. ${key} | score=${a.score.toFixed(4)} | visits=${a.visits}`);
            });
        }
    }
}
