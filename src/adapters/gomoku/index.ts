// Gomoku adapter exports
export { GomokuState, DEFAULT_GOMOKU_RULES, gomokuActionKey } from './state.js';
export type { GomokuAction, GomokuOptions, GomokuRules, Stone } from './state.js';
export { gomokuNeighbourhoodFilter } from './heuristics.js';
