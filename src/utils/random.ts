/**
 * Source of uniformly distributed numbers in [0, 1).
 *
 * Every stochastic step of the engine (selection tie-break, expansion choice,
 * rollout moves) draws from one of these so a search can be replayed from a seed.
 */
export interface Random {
    next(): number;
}

/**
 * Seeded mulberry32 generator. Not for cryptographic use.
 */
export class SeededRandom implements Random {
    private state: number;

    constructor(readonly seed: number) {
        this.state = seed >>> 0;
    }

    next(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let x = this.state;
        x = Math.imul(x ^ (x >>> 15), x | 1);
        x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
        return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
    }
}

export function createRandom(seed?: number): SeededRandom {
    return new SeededRandom(seed ?? Math.floor(Math.random() * 4294967296));
}

export function randomIndex(rng: Random, length: number): number {
    return Math.min(Math.floor(rng.next() * length), length - 1);
}

export function randomChoice<T>(rng: Random, items: readonly T[]): T {
    if (items.length === 0) {
        throw new Error('randomChoice called with an empty array');
    }
    return items[randomIndex(rng, items.length)];
}

/**
 * Picks an item with probability proportional to its weight.
 * Non-positive weights never win; if every weight is non-positive the choice is uniform.
 */
export function weightedChoice<T>(rng: Random, items: readonly T[], getWeight: (item: T) => number): T {
    if (items.length === 0) {
        throw new Error('weightedChoice called with an empty array');
    }

    const weights = items.map(item => Math.max(0, getWeight(item)));
    const totalWeight = weights.reduce((sum, weight) => sum + weight, 0);
    if (totalWeight <= 0) {
        return randomChoice(rng, items);
    }

    const randomValue = rng.next() * totalWeight;
    let currentWeight = 0;
    for (let i = 0; i < items.length; i++) {
        currentWeight += weights[i];
        if (weights[i] > 0 && randomValue < currentWeight) {
            return items[i];
        }
    }

    // Rounding can leave randomValue a hair above the last boundary
    for (let i = items.length - 1; i >= 0; i--) {
        if (weights[i] > 0) {
            return items[i];
        }
    }
    return items[items.length - 1];
}
