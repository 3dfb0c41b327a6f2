/**
 * Raised when a search tree is constructed (or a search is requested) with
 * parameters the engine cannot honour. Nothing is built when this is thrown.
 */
export class MCTSConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MCTSConfigurationError';
    }
}

/**
 * Raised when an internal tree invariant is broken: expanding a node that has
 * nothing left to expand, removing a node that is not a child, selecting among
 * unvisited children, etc. These indicate a programming error, not a domain
 * condition, and are never recovered from inside the engine.
 */
export class MCTSInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MCTSInvariantError';
    }
}
