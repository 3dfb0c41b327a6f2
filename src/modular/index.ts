// Export all modular MCTS components
export { MonteCarloSearchTree } from './mcts.js';
export type { MCTSPolicies, SearchOptions, ActionStatistics } from './mcts.js';
export { MCTSSelection } from './selection.js';
export type { SelectionStrategy } from './selection.js';
export { MCTSExpansion } from './expansion.js';
export type { ExpansionStrategy } from './expansion.js';
export { MCTSSimulation } from './simulation.js';
export { MCTSBackpropagation, NegamaxBackpropagation } from './backpropagation.js';
export type { BackpropagationStrategy } from './backpropagation.js';
export { DEFAULT_MCTS_CONFIG, resolveMCTSConfig, validateMCTSConfig } from './mcts-config.js';
export type { MCTSConfig, ExtractionStrategy, ExpansionOrder } from './mcts-config.js';
