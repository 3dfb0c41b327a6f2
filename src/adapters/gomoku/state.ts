import type { MCTSState } from '../../mcts-state.js';

/** 0 is black (moves first), 1 is white */
export type Stone = 0 | 1;

export type GomokuAction = {
    player: Stone;
    row: number;
    col: number;
};

export interface GomokuRules {
    boardSize: number;
    winningLength: number;
}

export const DEFAULT_GOMOKU_RULES: GomokuRules = {
    boardSize: 9,
    winningLength: 5,
};

export interface GomokuOptions {
    rules?: Partial<GomokuRules>;

    /** The side the reward is computed for */
    rewardPlayer?: Stone;

    /**
     * Only propose moves next to an existing stone (the centre on an empty
     * board). Shrinks the branching factor for the side that uses it.
     */
    useHeuristics?: boolean;
}

const DIRECTIONS: readonly (readonly [number, number])[] = [
    [ 0, 1 ], [ 1, 0 ], [ 1, 1 ], [ 1, -1 ],
];

export const gomokuActionKey = (action: GomokuAction): string => `${action.player}@${action.row},${action.col}`;

/**
 * Gomoku position.
 *
 * The reward is fixed to `rewardPlayer`: +1 when that side has `winningLength`
 * stones in a row, -1 when the other side has, 0 otherwise. Two trees playing
 * against each other therefore each hold a copy of the position with their own
 * rewardPlayer.
 */
export class GomokuState implements MCTSState<GomokuAction> {
    private constructor(
        readonly rules: GomokuRules,
        private readonly cells: readonly (Stone | null)[],
        readonly player: Stone,
        readonly rewardPlayer: Stone,
        readonly useHeuristics: boolean,
        readonly winner: Stone | null,
        readonly moveCount: number,
    ) {}

    static initial(options: GomokuOptions = {}): GomokuState {
        const rules: GomokuRules = { ...DEFAULT_GOMOKU_RULES, ...options.rules };
        if (!Number.isInteger(rules.boardSize) || rules.boardSize < 1) {
            throw new Error(`Invalid board size ${rules.boardSize}`);
        }
        if (!Number.isInteger(rules.winningLength) || rules.winningLength < 1 || rules.winningLength > rules.boardSize) {
            throw new Error(`Invalid winning length ${rules.winningLength}`);
        }
        const cells = new Array<Stone | null>(rules.boardSize * rules.boardSize).fill(null);
        return new GomokuState(rules, cells, 0, options.rewardPlayer ?? 0, options.useHeuristics ?? false, null, 0);
    }

    /**
     * Plays the given positions alternately, black first.
     */
    static fromMoves(positions: readonly (readonly [number, number])[], options: GomokuOptions = {}): GomokuState {
        return positions.reduce<GomokuState>((state, [ row, col ]) => state.go(row, col), GomokuState.initial(options));
    }

    get boardSize(): number {
        return this.rules.boardSize;
    }

    stoneAt(row: number, col: number): Stone | null {
        return this.isInBoard(row, col) ? this.cells[row * this.boardSize + col] : null;
    }

    isInBoard(row: number, col: number): boolean {
        return Number.isInteger(row) && Number.isInteger(col)
            && row >= 0 && row < this.boardSize && col >= 0 && col < this.boardSize;
    }

    /** Whether any of the eight surrounding cells holds a stone */
    hasAdjacentStone(row: number, col: number): boolean {
        for (let dr = -1; dr <= 1; dr++) {
            for (let dc = -1; dc <= 1; dc++) {
                if ((dr !== 0 || dc !== 0) && this.stoneAt(row + dr, col + dc) !== null) {
                    return true;
                }
            }
        }
        return false;
    }

    get possibleActions(): GomokuAction[] {
        if (this.isTerminal) {
            return [];
        }

        if (this.useHeuristics && this.moveCount === 0) {
            const centre = Math.floor(this.boardSize / 2);
            return [{ player: this.player, row: centre, col: centre }];
        }

        const actions: GomokuAction[] = [];
        for (let row = 0; row < this.boardSize; row++) {
            for (let col = 0; col < this.boardSize; col++) {
                if (this.stoneAt(row, col) === null && (!this.useHeuristics || this.hasAdjacentStone(row, col))) {
                    actions.push({ player: this.player, row, col });
                }
            }
        }
        return actions;
    }

    get isTerminal(): boolean {
        return this.winner !== null || this.moveCount === this.cells.length;
    }

    get blackReward(): number {
        if (this.winner === 0) {
            return 1;
        }
        return this.winner === 1 ? -1 : 0;
    }

    get reward(): number {
        return this.rewardPlayer === 0 ? this.blackReward : -this.blackReward;
    }

    executeAction(action: GomokuAction): GomokuState {
        if (this.isTerminal) {
            throw new Error('The game is already over');
        }
        if (action.player !== this.player) {
            throw new Error(`It is not player ${action.player}'s turn`);
        }
        if (!this.isInBoard(action.row, action.col)) {
            throw new Error(`Position (${action.row}, ${action.col}) is not on the board`);
        }
        if (this.stoneAt(action.row, action.col) !== null) {
            throw new Error(`Position (${action.row}, ${action.col}) has already been taken`);
        }

        const cells = [ ...this.cells ];
        cells[action.row * this.boardSize + action.col] = action.player;
        const next = new GomokuState(this.rules, cells, this.player === 0 ? 1 : 0, this.rewardPlayer, this.useHeuristics, null, this.moveCount + 1);
        const winner = next.longestLineThrough(action.row, action.col) >= this.rules.winningLength ? action.player : null;

        return winner === null ? next : next.withWinner(winner);
    }

    go(row: number, col: number): GomokuState {
        return this.executeAction({ player: this.player, row, col });
    }

    withRewardPlayer(rewardPlayer: Stone): GomokuState {
        return new GomokuState(this.rules, this.cells, this.player, rewardPlayer, this.useHeuristics, this.winner, this.moveCount);
    }

    withHeuristics(useHeuristics: boolean): GomokuState {
        return new GomokuState(this.rules, this.cells, this.player, this.rewardPlayer, useHeuristics, this.winner, this.moveCount);
    }

    toString(): string {
        const rows: string[] = [];
        for (let row = 0; row < this.boardSize; row++) {
            let line = '';
            for (let col = 0; col < this.boardSize; col++) {
                const stone = this.stoneAt(row, col);
                line += stone === 0 ? 'B' : stone === 1 ? 'W' : '#';
            }
            rows.push(line);
        }
        return rows.join('\n');
    }

    private withWinner(winner: Stone): GomokuState {
        return new GomokuState(this.rules, this.cells, this.player, this.rewardPlayer, this.useHeuristics, winner, this.moveCount);
    }

    private longestLineThrough(row: number, col: number): number {
        const stone = this.stoneAt(row, col);
        if (stone === null) {
            return 0;
        }

        let longest = 0;
        for (const [ dr, dc ] of DIRECTIONS) {
            let length = 1;
            for (const sign of [ 1, -1 ]) {
                let r = row + sign * dr;
                let c = col + sign * dc;
                while (this.stoneAt(r, c) === stone) {
                    length++;
                    r += sign * dr;
                    c += sign * dc;
                }
            }
            longest = Math.max(longest, length);
        }
        return longest;
    }
}
