// Tic-tac-toe adapter exports
export { TicTacToeState, ticTacToeActionKey } from './state.js';
export type { TicTacToeAction, Mark } from './state.js';
