import type { MCTSState } from '../../mcts-state.js';

/** 1 for crosses (who move first), -1 for noughts */
export type Mark = 1 | -1;

export type TicTacToeAction = {
    player: Mark;
    row: number;
    col: number;
};

const LINES: readonly (readonly [number, number, number])[] = [
    [ 0, 1, 2 ], [ 3, 4, 5 ], [ 6, 7, 8 ],
    [ 0, 3, 6 ], [ 1, 4, 7 ], [ 2, 5, 8 ],
    [ 0, 4, 8 ], [ 2, 4, 6 ],
];

export const ticTacToeActionKey = (action: TicTacToeAction): string => `${action.player}@${action.row},${action.col}`;

/**
 * Noughts and crosses on a 3x3 board.
 *
 * Cells hold 0 (empty), 1 or -1. The reward is +1 when `rewardPlayer` has three
 * in a row, -1 when the opponent has, 0 otherwise.
 */
export class TicTacToeState implements MCTSState<TicTacToeAction> {
    readonly winner: Mark | 0;

    private constructor(
        readonly board: readonly number[],
        readonly currentPlayer: Mark,
        readonly rewardPlayer: Mark,
    ) {
        this.winner = findWinner(board);
    }

    static initial(rewardPlayer: Mark = 1): TicTacToeState {
        return new TicTacToeState(new Array<number>(9).fill(0), 1, rewardPlayer);
    }

    /**
     * Builds a position from rows such as `['X.O', '.X.', '..O']`.
     * The side to move is derived from the stone counts.
     */
    static fromRows(rows: readonly string[], rewardPlayer: Mark = 1): TicTacToeState {
        const cells = rows.join('');
        if (rows.length !== 3 || cells.length !== 9) {
            throw new Error('A tic-tac-toe board needs three rows of three cells');
        }
        const board = [ ...cells ].map(cell => {
            switch (cell) {
                case 'X': return 1;
                case 'O': return -1;
                case '.': return 0;
                default: throw new Error(`Unknown tic-tac-toe cell "${cell}"`);
            }
        });
        const crosses = board.filter(cell => cell === 1).length;
        const noughts = board.filter(cell => cell === -1).length;
        if (crosses !== noughts && crosses !== noughts + 1) {
            throw new Error('Stone counts do not describe a reachable position');
        }
        return new TicTacToeState(board, crosses === noughts ? 1 : -1, rewardPlayer);
    }

    get possibleActions(): TicTacToeAction[] {
        if (this.isTerminal) {
            return [];
        }
        const actions: TicTacToeAction[] = [];
        this.board.forEach((cell, index) => {
            if (cell === 0) {
                actions.push({ player: this.currentPlayer, row: Math.floor(index / 3), col: index % 3 });
            }
        });
        return actions;
    }

    get isTerminal(): boolean {
        return this.winner !== 0 || this.board.every(cell => cell !== 0);
    }

    get reward(): number {
        return this.winner * this.rewardPlayer;
    }

    executeAction(action: TicTacToeAction): TicTacToeState {
        if (action.player !== this.currentPlayer) {
            throw new Error(`It is not player ${action.player}'s turn`);
        }
        const index = action.row * 3 + action.col;
        if (action.row < 0 || action.row > 2 || action.col < 0 || action.col > 2 || this.board[index] !== 0) {
            throw new Error(`Cell (${action.row}, ${action.col}) is not available`);
        }

        const board = [ ...this.board ];
        board[index] = action.player;
        return new TicTacToeState(board, action.player === 1 ? -1 : 1, this.rewardPlayer);
    }

    toString(): string {
        const symbol = (cell: number): string => (cell === 1 ? 'X' : cell === -1 ? 'O' : '.');
        return [ 0, 3, 6 ].map(start => this.board.slice(start, start + 3).map(symbol).join('')).join('\n');
    }
}

function findWinner(board: readonly number[]): Mark | 0 {
    for (const [ a, b, c ] of LINES) {
        const sum = board[a] + board[b] + board[c];
        if (sum === 3) {
            return 1;
        }
        if (sum === -3) {
            return -1;
        }
    }
    return 0;
}
