/*
 * Main entry point for the mcts-engine package
 * Re-exports all public APIs
 */

export type { MCTSState, ActionKey } from './mcts-state.js';
export { defaultActionKey } from './mcts-state.js';
export { MCTSNode } from './mcts-node.js';
export type { MCTSChild } from './mcts-node.js';
export { MCTSConfigurationError, MCTSInvariantError } from './errors.js';
export * from './modular/index.js';
export * from './strategies/index.js';
export { calculateAvgScore, getUCB1Score } from './utils/mcts-node-utils.js';
export { formatTree, printTree, getNodePath } from './utils/tree-debug.js';
export { SeededRandom, createRandom, randomChoice, randomIndex, weightedChoice } from './utils/random.js';
export type { Random } from './utils/random.js';
export { playGame } from './utils/self-play.js';
export type { SelfPlayOptions, SelfPlayMove, SelfPlayResult } from './utils/self-play.js';
export * from './adapters/tic-tac-toe/index.js';
export * from './adapters/gomoku/index.js';
export * from './adapters/maze/index.js';
