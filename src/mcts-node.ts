import { type ActionKey, type MCTSState, defaultActionKey } from './mcts-state.js';
import { MCTSInvariantError } from './errors.js';

/**
 * An edge of the search tree: the action taken from a node and the node it leads to.
 */
export type MCTSChild<Action> = {
    action: Action;
    node: MCTSNode<Action>;
};

/**
 * A vertex of the Monte Carlo search tree.
 *
 * Each node owns the state it was created from and the child nodes materialised
 * beneath it, keyed by action. The parent reference is non-owning: it only exists
 * so that backpropagation can walk to the root, and is cleared when the node is
 * detached by removeChild.
 *
 * LIFECYCLE:
 * unexpanded -> partially expanded -> fully expanded (untriedActions empty).
 * Terminal nodes start with no untried actions and never get children; they are
 * absorbing and are never expanded or descended through.
 *
 * STATISTICS:
 * - visits: number of rounds whose backpropagation passed through this node
 * - totalReward: sum (not mean) of the rewards backpropagated through it
 * For every node, visits >= sum of its children's visits.
 */
export class MCTSNode<Action> {
    visits = 0;

    totalReward = 0;

    private parentNode: MCTSNode<Action> | undefined = undefined;

    private incomingAction: Action | undefined = undefined;

    private nodeDepth = 1;

    private readonly childMap = new Map<string, MCTSChild<Action>>();

    private readonly untried: Action[];

    constructor(
        readonly state: MCTSState<Action>,
        readonly actionKey: ActionKey<Action> = defaultActionKey,
    ) {
        if (state.isTerminal) {
            this.untried = [];
            return;
        }

        const seen = new Set<string>();
        this.untried = [];
        for (const action of state.possibleActions) {
            const key = actionKey(action);
            if (!seen.has(key)) {
                seen.add(key);
                this.untried.push(action);
            }
        }

        if (this.untried.length === 0) {
            throw new MCTSInvariantError('Non-terminal state offers no possible actions');
        }
    }

    get parent(): MCTSNode<Action> | undefined {
        return this.parentNode;
    }

    /** The action that created this node from its (current or former) parent */
    get lastAction(): Action | undefined {
        return this.incomingAction;
    }

    get children(): ReadonlyMap<string, MCTSChild<Action>> {
        return this.childMap;
    }

    get untriedActions(): readonly Action[] {
        return this.untried;
    }

    get isExpanded(): boolean {
        return this.untried.length === 0;
    }

    get isTerminal(): boolean {
        return this.state.isTerminal;
    }

    /**
     * Number of nodes on the path from the root to this node, inclusive.
     * The root therefore has depth 1. Stored on the node and rebased when a
     * subtree is detached.
     */
    get depth(): number {
        return this.nodeDepth;
    }

    /**
     * Mean backpropagated reward. Only meaningful once visits > 0; unvisited
     * nodes report 0 so they can be printed.
     */
    get averageReward(): number {
        return this.visits > 0 ? this.totalReward / this.visits : 0;
    }

    getChild(action: Action): MCTSNode<Action> | undefined {
        return this.childMap.get(this.actionKey(action))?.node;
    }

    hasChild(action: Action): boolean {
        return this.childMap.has(this.actionKey(action));
    }

    /**
     * Materialises the child reached by `action`.
     *
     * The action is normally one of untriedActions. An action outside that set
     * (e.g. an opponent move a heuristic action generator never proposes) is also
     * accepted when re-deriving a committed move; its validity is then left to
     * the domain's executeAction, which is called before the node is touched.
     */
    addChild(action: Action): MCTSNode<Action> {
        if (this.isTerminal) {
            throw new MCTSInvariantError('Cannot add a child to a terminal node');
        }

        const key = this.actionKey(action);
        if (this.childMap.has(key)) {
            throw new MCTSInvariantError(`Node already has a child for action ${key}`);
        }

        const child = new MCTSNode(this.state.executeAction(action), this.actionKey);

        const untriedIndex = this.untried.findIndex(candidate => this.actionKey(candidate) === key);
        if (untriedIndex >= 0) {
            this.untried.splice(untriedIndex, 1);
        }

        child.parentNode = this;
        child.incomingAction = action;
        child.nodeDepth = this.nodeDepth + 1;
        this.childMap.set(key, { action, node: child });
        return child;
    }

    /**
     * Detaches `child` (matched by identity) from this node and clears its
     * parent reference. The child keeps its statistics and its own subtree,
     * which is re-levelled so that the child has depth 1.
     */
    removeChild(child: MCTSNode<Action>): this {
        this.detach(child);
        child.rebaseDepth();
        return this;
    }

    /**
     * Undoes the expansion that created `child`: detaches it and puts its action
     * back at the front of untriedActions, so the next expansion (sequential
     * order included) can pick it again.
     */
    discardChild(child: MCTSNode<Action>): this {
        const action = this.detach(child);
        this.untried.unshift(action);
        return this;
    }

    private detach(child: MCTSNode<Action>): Action {
        for (const [ key, entry ] of this.childMap) {
            if (entry.node === child) {
                child.parentNode = undefined;
                this.childMap.delete(key);
                return entry.action;
            }
        }
        throw new MCTSInvariantError('Cannot remove node: child not found');
    }

    private rebaseDepth(): void {
        this.nodeDepth = 1;
        const pending: MCTSNode<Action>[] = [ this ];
        let current = pending.pop();
        while (current !== undefined) {
            for (const { node } of current.childMap.values()) {
                node.nodeDepth = current.nodeDepth + 1;
                pending.push(node);
            }
            current = pending.pop();
        }
    }
}
