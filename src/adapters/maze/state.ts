import type { MCTSState } from '../../mcts-state.js';
import { type MazeEnvironment, type Position, positionKey } from './environment.js';

export type MazeAction = {
    agent: number;
    x: number;
    y: number;
};

const MOVES: readonly Position[] = [
    [ 1, 0 ], [ -1, 0 ], [ 0, 1 ], [ 0, -1 ],
];

export const mazeActionKey = (action: MazeAction): string => `${action.agent}@${action.x},${action.y}`;

/**
 * Reward-collection game on a MazeEnvironment.
 *
 * Agents take turns moving one cell (4-neighbourhood, never into an obstacle).
 * One unit of time passes once every agent has moved; the game ends when time
 * runs out. The reward is the summed value of the distinct targets any agent
 * has stepped on. An agent boxed in on every side may only stay put.
 */
export class MazeState implements MCTSState<MazeAction> {
    private constructor(
        readonly environment: MazeEnvironment,
        readonly paths: readonly (readonly Position[])[],
        readonly turn: number,
        readonly timeRemaining: number,
    ) {}

    static create(environment: MazeEnvironment, agentStarts: readonly Position[], timeRemaining: number = 10): MazeState {
        if (!Number.isInteger(timeRemaining) || timeRemaining < 0) {
            throw new Error('The remaining time cannot be negative');
        }
        if (agentStarts.length === 0) {
            throw new Error('A maze needs at least one agent');
        }
        for (const start of agentStarts) {
            if (!environment.isFree(start)) {
                throw new Error(`Agent cannot start at (${start[0]}, ${start[1]})`);
            }
        }
        return new MazeState(environment, agentStarts.map(start => [ start ]), 0, timeRemaining);
    }

    /** Current position of each agent */
    get positions(): Position[] {
        return this.paths.map(path => path[path.length - 1]);
    }

    get visited(): Set<string> {
        const visited = new Set<string>();
        for (const path of this.paths) {
            for (const position of path) {
                visited.add(positionKey(position));
            }
        }
        return visited;
    }

    get reward(): number {
        const visited = this.visited;
        return this.environment.targets
            .filter(target => visited.has(positionKey(target.position)))
            .reduce((sum, target) => sum + target.value, 0);
    }

    get isTerminal(): boolean {
        return this.timeRemaining <= 0;
    }

    get possibleActions(): MazeAction[] {
        if (this.isTerminal) {
            return [];
        }

        const [ x, y ] = this.positions[this.turn];
        const actions = MOVES
            .map(([ dx, dy ]): Position => [ x + dx, y + dy ])
            .filter(position => this.environment.isFree(position))
            .map(([ nx, ny ]) => ({ agent: this.turn, x: nx, y: ny }));

        return actions.length > 0 ? actions : [{ agent: this.turn, x, y }];
    }

    executeAction(action: MazeAction): MazeState {
        if (action.agent !== this.turn) {
            throw new Error(`It is not agent ${action.agent}'s turn`);
        }
        const key = mazeActionKey(action);
        if (!this.possibleActions.some(candidate => mazeActionKey(candidate) === key)) {
            throw new Error(`Agent ${action.agent} cannot move to (${action.x}, ${action.y})`);
        }

        const paths = this.paths.map((path, agent) => (agent === action.agent ? [ ...path, [ action.x, action.y ] as const ] : path));
        const nextTurn = (this.turn + 1) % this.paths.length;
        const timeRemaining = nextTurn === 0 ? this.timeRemaining - 1 : this.timeRemaining;

        return new MazeState(this.environment, paths, nextTurn, timeRemaining);
    }
}
