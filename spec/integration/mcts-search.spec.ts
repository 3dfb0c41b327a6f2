import { expect } from 'chai';
import { MonteCarloSearchTree } from '../../src/modular/mcts.js';
import { NegamaxBackpropagation } from '../../src/modular/backpropagation.js';
import { MCTSConfigurationError, MCTSInvariantError } from '../../src/errors.js';
import { RandomRolloutPolicy, type RolloutPolicy } from '../../src/strategies/index.js';
import { BranchingState, ChoiceState, DomainFailure, FailingState, TwoActionState, pathOf } from '../helpers/test-domains.js';
import { collectNodes } from '../helpers/node-factory.js';

const captureConsole = (run: () => void): string[] => {
    const lines: string[] = [];
    const originalLog = console.log;
    console.log = (...args: unknown[]) => {
        lines.push(args.map(String).join(' '));
    };
    try {
        run();
    } finally {
        console.log = originalLog;
    }
    return lines;
};

describe('MonteCarloSearchTree', () => {
    describe('Construction', () => {
        it('should reject an invalid configuration before building anything', () => {
            expect(() => new MonteCarloSearchTree(new TwoActionState(), { samples: 0 })).to.throw(MCTSConfigurationError);
            expect(() => new MonteCarloSearchTree(new TwoActionState(), { maxTreeDepth: 1 })).to.throw(MCTSConfigurationError);
            expect(() => new MonteCarloSearchTree(new TwoActionState(), { explorationConst: -1 })).to.throw(MCTSConfigurationError);
        });

        it('should reject a non-terminal initial state without actions', () => {
            expect(() => new MonteCarloSearchTree(new ChoiceState([]))).to.throw(MCTSInvariantError);
        });

        it('should de-duplicate root actions with the supplied action key', () => {
            const tree = new MonteCarloSearchTree(new ChoiceState([ 'a', 'A', 'b' ]), {}, { actionKey: label => label.toLowerCase() });

            expect(tree.root.untriedActions).to.deep.equal([ 'a', 'b' ]);
        });

        it('should start from an unvisited root', () => {
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 10, seed: 1 });

            expect(tree.root.visits).to.equal(0);
            expect(tree.root.children.size).to.equal(0);
            expect(tree.lastSearchRounds).to.equal(0);
        });
    });

    describe('Search', () => {
        it('should prefer the winning action for every seed', () => {
            for (let seed = 1; seed <= 20; seed++) {
                const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 1000, seed });

                expect(tree.searchForActions()).to.deep.equal([ 'good' ]);
            }
        });

        it('should add exactly one root visit per round', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 4), { samples: 50, seed: 2 });

            tree.searchForActions();
            expect(tree.root.visits).to.equal(50);
            expect(tree.lastSearchRounds).to.equal(50);

            tree.searchForActions();
            expect(tree.root.visits).to.equal(100);
        });

        it('should keep every node at least as visited as its children together', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 4, path => path[0] / 2), { samples: 300, seed: 3 });

            tree.searchForActions();

            for (const node of collectNodes(tree.root)) {
                let childVisits = 0;
                for (const { node: child } of node.children.values()) {
                    expect(child.visits).to.be.at.least(1);
                    childVisits += child.visits;
                }
                expect(node.visits).to.be.at.least(childVisits);
            }
        });

        it('should never grow the tree beyond the depth cap', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 5), { samples: 200, maxTreeDepth: 2, seed: 4 });

            tree.searchForActions();

            const depths = collectNodes(tree.root).map(node => node.depth);
            expect(Math.max(...depths)).to.equal(2);
            expect(tree.root.children.size).to.equal(3);
        });

        it('should simulate a terminal root in place', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 0, () => 0.5), { samples: 4, seed: 5 });

            expect(tree.searchForActions()).to.deep.equal([]);
            expect(tree.root.visits).to.equal(4);
            expect(tree.root.totalReward).to.equal(2);
        });

        it('should reject an invalid search depth', () => {
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 10, seed: 1 });

            expect(() => tree.searchForActions(0)).to.throw(MCTSConfigurationError);
            expect(() => tree.searchForActions(1.5)).to.throw(MCTSConfigurationError);
            expect(tree.root.visits).to.equal(0);
        });

        it('should produce the same tree for the same seed', () => {
            const reward = (path: readonly number[]): number => (path[0] + path[1] * 2) / 10;
            const first = new MonteCarloSearchTree(new BranchingState(3, 3, reward), { samples: 120, seed: 42 });
            const second = new MonteCarloSearchTree(new BranchingState(3, 3, reward), { samples: 120, seed: 42 });

            expect(first.searchForActions(2)).to.deep.equal(second.searchForActions(2));
            expect(first.getActionStatistics()).to.deep.equal(second.getActionStatistics());
        });

        it('should report root actions by descending mean reward', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 1, path => path[0]), { samples: 30, seed: 6 });

            tree.searchForActions();
            const statistics = tree.getActionStatistics();

            expect(statistics.map(entry => entry.action)).to.deep.equal([ 2, 1, 0 ]);
            expect(statistics.map(entry => entry.score)).to.deep.equal([ 2, 1, 0 ]);
            expect(statistics.reduce((sum, entry) => sum + entry.visits, 0)).to.equal(30);
        });
    });

    describe('Action extraction', () => {
        // (1, 0) is the only winning line; (0, x) is a safe small reward
        const leafRewards: Record<string, number> = { '1,0': 1, '0,0': 0.2, '0,1': 0.2, '1,1': 0 };
        const trap = (path: readonly number[]): number => leafRewards[path.join(',')];

        it('should return one action per requested ply', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 2, path => (path[0] === 1 && path[1] === 0 ? 1 : 0)), { samples: 200, seed: 3 });

            expect(tree.searchForActions(2)).to.deep.equal([ 1, 0 ]);
        });

        it('should stop early when the tree is shallower than the search depth', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 1, path => path[0]), { samples: 20, seed: 3 });

            expect(tree.searchForActions(3)).to.deep.equal([ 1 ]);
        });

        it('should return the path to the best deepest node with lookahead', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 2, trap), { samples: 200, seed: 8, extraction: 'lookahead' });

            expect(tree.searchForActions(2)).to.deep.equal([ 1, 0 ]);
        });

        it('should keep the first path found on lookahead ties', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 2), {
                samples: 50,
                seed: 8,
                extraction: 'lookahead',
                expansionOrder: 'sequential',
            });

            expect(tree.searchForActions(2)).to.deep.equal([ 0, 0 ]);
        });

        it('should return nothing for a terminal root with lookahead', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(2, 0), { samples: 5, seed: 8, extraction: 'lookahead' });

            expect(tree.searchForActions(2)).to.deep.equal([]);
        });
    });

    describe('Root advancement', () => {
        it('should reuse the statistics of an explored child', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 3), { samples: 100, seed: 9 });
            tree.searchForActions();
            const child = tree.root.getChild(0);
            expect(child).to.not.be.undefined;
            const visits = child?.visits ?? 0;
            const oldRoot = tree.root;

            tree.updateRoot(0);

            expect(tree.root).to.equal(child);
            expect(tree.root.parent).to.be.undefined;
            expect(tree.root.depth).to.equal(1);
            expect(tree.root.visits).to.equal(visits);
            expect(oldRoot.hasChild(0)).to.be.false;

            tree.searchForActions();
            expect(tree.root.visits).to.equal(visits + 100);
        });

        it('should create the child of an unexplored action', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 3), { samples: 20, seed: 9 });

            tree.updateRoot(2);

            expect(pathOf(tree.root.state)).to.deep.equal([ 2 ]);
            expect(tree.root.visits).to.equal(0);
            expect(tree.searchForActions()).to.have.length(1);
            expect(tree.root.visits).to.equal(20);
        });

        it('should leave the root in place when the domain rejects the action', () => {
            const tree = new MonteCarloSearchTree(new BranchingState(3, 3), { samples: 20, seed: 9 });
            const root = tree.root;

            expect(() => tree.updateRoot(7)).to.throw('Invalid action 7');
            expect(tree.root).to.equal(root);
        });
    });

    describe('Search budget', () => {
        it('should run no round when the signal is already aborted', () => {
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 100, seed: 1 });
            const controller = new AbortController();
            controller.abort();

            expect(tree.searchForActions(1, { signal: controller.signal })).to.deep.equal([]);
            expect(tree.lastSearchRounds).to.equal(0);
            expect(tree.root.visits).to.equal(0);
        });

        it('should finish the current round and stop once aborted', () => {
            const controller = new AbortController();
            let rollouts = 0;
            const counting: RolloutPolicy<number> = {
                rollout() {
                    rollouts++;
                    if (rollouts === 10) {
                        controller.abort();
                    }
                    return 0;
                },
            };
            const tree = new MonteCarloSearchTree(new BranchingState(3, 4), { samples: 1000, seed: 1 }, { rolloutPolicy: counting });

            tree.searchForActions(1, { signal: controller.signal });

            expect(tree.lastSearchRounds).to.equal(10);
            expect(tree.root.visits).to.equal(10);
        });

        it('should stop when the time limit runs out', () => {
            const slow: RolloutPolicy<number> = {
                rollout() {
                    const end = Date.now() + 5;
                    while (Date.now() < end) {
                        // busy wait
                    }
                    return 0;
                },
            };
            const tree = new MonteCarloSearchTree(new BranchingState(3, 4), { samples: 1000, seed: 1, timeLimitMs: 50 }, { rolloutPolicy: slow });

            tree.searchForActions();

            expect(tree.lastSearchRounds).to.be.at.least(1);
            expect(tree.lastSearchRounds).to.be.below(1000);
        });
    });

    describe('Reward perspective', () => {
        it('should credit the root with the opposite of its children under negamax', () => {
            const tree = new MonteCarloSearchTree(
                new BranchingState(2, 3, path => (path[0] === 0 ? 1 : -1)),
                { samples: 60, seed: 10 },
                { backpropagation: new NegamaxBackpropagation() },
            );

            tree.searchForActions();

            let childTotal = 0;
            for (const { node } of tree.root.children.values()) {
                childTotal += node.totalReward;
            }
            expect(tree.root.totalReward).to.equal(-childTotal);
        });
    });

    describe('Domain failures', () => {
        it('should pass a failing domain transition through unchanged', () => {
            const failure = new DomainFailure('illegal transition');
            const tree = new MonteCarloSearchTree(new FailingState(failure), { samples: 10, seed: 1 });

            expect(() => tree.searchForActions()).to.throw(failure);
            expect(tree.root.visits).to.equal(0);
        });

        it('should pass a failing rollout through unchanged', () => {
            const failure = new DomainFailure('rollout broke');
            const failing: RolloutPolicy<number> = {
                rollout() {
                    throw failure;
                },
            };
            const tree = new MonteCarloSearchTree(new BranchingState(2, 2), { samples: 10, seed: 1 }, { rolloutPolicy: failing });

            expect(() => tree.searchForActions()).to.throw(failure);
            expect(tree.root.children.size).to.equal(0);
            expect(tree.root.untriedActions).to.have.members([ 0, 1 ]);
        });

        it('should recover from a rollout that failed once', () => {
            let calls = 0;
            const flaky: RolloutPolicy<number> = {
                rollout() {
                    calls++;
                    if (calls === 1) {
                        throw new DomainFailure('transient');
                    }
                    return 0;
                },
            };
            const tree = new MonteCarloSearchTree(new BranchingState(2, 3), { samples: 50, seed: 1 }, { rolloutPolicy: flaky });

            expect(() => tree.searchForActions()).to.throw('transient');
            expect(tree.root.visits).to.equal(0);
            expect(tree.root.children.size).to.equal(0);

            expect(tree.searchForActions()).to.have.length(1);
            expect(tree.root.visits).to.equal(50);
            expect(tree.lastSearchRounds).to.equal(50);
            for (const node of collectNodes(tree.root)) {
                for (const { node: child } of node.children.values()) {
                    expect(child.visits).to.be.at.least(1);
                }
            }
        });

        it('should keep raising the step limit error rather than corrupting the tree', () => {
            const tree = new MonteCarloSearchTree(
                new BranchingState(2, 6),
                { samples: 10, seed: 1 },
                { rolloutPolicy: new RandomRolloutPolicy<number>({ maxSteps: 4 }) },
            );

            for (let attempt = 0; attempt < 3; attempt++) {
                expect(() => tree.searchForActions()).to.throw('Rollout did not reach a terminal state within 4 steps');
                expect(tree.root.children.size).to.equal(0);
                expect(tree.root.visits).to.equal(0);
            }
        });
    });

    describe('Logging', () => {
        afterEach(() => {
            delete process.env.DEBUG_TREE;
            delete process.env.LOG_MCTS_SCORES;
        });

        it('should print the tree when DEBUG_TREE is set', () => {
            process.env.DEBUG_TREE = 'true';
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 2, seed: 1 });

            const lines = captureConsole(() => tree.searchForActions());

            expect(lines[0]).to.equal('\n[TREE-STRUCTURE] Final MCTS tree:');
            expect(lines[1]).to.equal('ROOT: visits=2, avg=0.5000, children=2');
            expect(lines).to.have.length(4);
        });

        it('should print the root action scores when LOG_MCTS_SCORES is set', () => {
            process.env.LOG_MCTS_SCORES = 'true';
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 2, seed: 1 });

            const lines = captureConsole(() => tree.searchForActions());

            expect(lines).to.deep.equal([
                '[MCTS] 2 actions evaluated over 2 rounds:',
                '  1. "good" | score=1.0000 | visits=1',
                '  2. "bad" | score=0.0000 | visits=1',
            ]);
        });

        it('should stay silent by default', () => {
            const tree = new MonteCarloSearchTree(new TwoActionState(), { samples: 2, seed: 1 });

            expect(captureConsole(() => tree.searchForActions())).to.deep.equal([]);
        });
    });
});
