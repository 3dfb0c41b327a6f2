import { MCTSConfigurationError } from '../errors.js';

/**
 * How the final actions are read off the tree once the sample budget is spent.
 * - greedy: repeated pure-exploitation UCB1 selection (C = 0), random tie-break
 * - lookahead: exhaustive walk of the built tree to searchDepth plies, keeping the
 *   path whose deepest node has the best mean reward, first-found tie-break
 */
export type ExtractionStrategy = 'greedy' | 'lookahead';

/**
 * Which untried action expansion materialises next.
 * - random: uniformly at random among the untried actions
 * - sequential: in the order the domain listed them
 */
export type ExpansionOrder = 'random' | 'sequential';

export interface MCTSConfig {
    /** Rounds run per searchForActions call */
    samples: number;

    /** Depth (root = 1) beyond which the tree is not grown */
    maxTreeDepth: number;

    /** C in the UCB1 formula used while descending during a round */
    explorationConst: number;

    extraction: ExtractionStrategy;

    expansionOrder: ExpansionOrder;

    /** Seed for the engine's generator; a random one is drawn when absent */
    seed?: number;

    /** Wall-clock budget per searchForActions call, checked between rounds */
    timeLimitMs?: number;
}

export const DEFAULT_MCTS_CONFIG: MCTSConfig = {
    samples: 1000,
    maxTreeDepth: 10,
    explorationConst: 1.0,
    extraction: 'greedy',
    expansionOrder: 'random',
};

export function resolveMCTSConfig(config: Partial<MCTSConfig> = {}): MCTSConfig {
    const resolved: MCTSConfig = { ...DEFAULT_MCTS_CONFIG, ...config };
    validateMCTSConfig(resolved);
    return resolved;
}

export function validateMCTSConfig(config: MCTSConfig): void {
    if (!Number.isInteger(config.samples) || config.samples <= 0) {
        throw new MCTSConfigurationError(`The number of samples must be a positive integer, got ${config.samples}`);
    }
    if (!Number.isInteger(config.maxTreeDepth) || config.maxTreeDepth <= 1) {
        throw new MCTSConfigurationError(`The maximal tree depth must be an integer greater than 1, got ${config.maxTreeDepth}`);
    }
    if (!Number.isFinite(config.explorationConst) || config.explorationConst < 0) {
        throw new MCTSConfigurationError(`The exploration constant must be a non-negative number, got ${config.explorationConst}`);
    }
    if (config.extraction !== 'greedy' && config.extraction !== 'lookahead') {
        throw new MCTSConfigurationError(`Unknown extraction strategy ${String(config.extraction)}`);
    }
    if (config.expansionOrder !== 'random' && config.expansionOrder !== 'sequential') {
        throw new MCTSConfigurationError(`Unknown expansion order ${String(config.expansionOrder)}`);
    }
    if (config.timeLimitMs !== undefined && !(config.timeLimitMs > 0)) {
        throw new MCTSConfigurationError(`The time limit must be positive, got ${config.timeLimitMs}`);
    }
}
