export type Position = readonly [number, number];

export type MazeTarget = {
    position: Position;
    value: number;
};

export interface MazeEnvironmentOptions {
    /** Inclusive x range */
    xlim: readonly [number, number];

    /** Inclusive y range */
    ylim: readonly [number, number];

    obstacles?: readonly Position[];

    targets?: readonly MazeTarget[];

    /** Wall off the outermost ring of cells. Defaults to true. */
    borderObstacles?: boolean;
}

export const positionKey = ([ x, y ]: Position): string => `${x},${y}`;

/**
 * Static grid the maze agents move in: bounds, obstacle cells and reward targets.
 * Shared by every MazeState derived from it and never modified after construction.
 * Targets placed on an obstacle are dropped.
 */
export class MazeEnvironment {
    readonly xMin: number;

    readonly xMax: number;

    readonly yMin: number;

    readonly yMax: number;

    private readonly obstacleKeys = new Set<string>();

    private readonly targetValues = new Map<string, MazeTarget>();

    constructor(options: MazeEnvironmentOptions) {
        this.xMin = options.xlim[0];
        this.xMax = options.xlim[1];
        this.yMin = options.ylim[0];
        this.yMax = options.ylim[1];
        if (this.xMin > this.xMax || this.yMin > this.yMax) {
            throw new Error('Maze bounds are empty');
        }

        for (const obstacle of options.obstacles ?? []) {
            this.obstacleKeys.add(positionKey(obstacle));
        }

        if (options.borderObstacles ?? true) {
            for (let y = this.yMin; y <= this.yMax; y++) {
                this.obstacleKeys.add(positionKey([ this.xMin, y ]));
                this.obstacleKeys.add(positionKey([ this.xMax, y ]));
            }
            for (let x = this.xMin; x <= this.xMax; x++) {
                this.obstacleKeys.add(positionKey([ x, this.yMin ]));
                this.obstacleKeys.add(positionKey([ x, this.yMax ]));
            }
        }

        for (const target of options.targets ?? []) {
            const key = positionKey(target.position);
            if (!this.obstacleKeys.has(key)) {
                this.targetValues.set(key, target);
            }
        }
    }

    isInRange([ x, y ]: Position): boolean {
        return x >= this.xMin && x <= this.xMax && y >= this.yMin && y <= this.yMax;
    }

    isObstacle(position: Position): boolean {
        return this.obstacleKeys.has(positionKey(position));
    }

    isFree(position: Position): boolean {
        return this.isInRange(position) && !this.isObstacle(position);
    }

    targetValue(position: Position): number {
        return this.targetValues.get(positionKey(position))?.value ?? 0;
    }

    get targets(): MazeTarget[] {
        return [ ...this.targetValues.values() ];
    }

    /** Largest single target value, 0 without targets */
    get maxReward(): number {
        return this.targets.reduce((max, target) => Math.max(max, target.value), 0);
    }

    /** Reward collected if every target were visited */
    get totalReward(): number {
        return this.targets.reduce((sum, target) => sum + target.value, 0);
    }
}
