import type { Coordinate } from './types';

export class OutOfBoundsError extends Error {
    readonly coordinate: Coordinate;
    readonly size: number;

    constructor(coordinate: Coordinate, size: number) {
        super(`Coordinate (${coordinate.x}, ${coordinate.y}) is outside the ${size}x${size} grid`);
        this.name = 'OutOfBoundsError';
        this.coordinate = { ...coordinate };
        this.size = size;
    }
}

export class UnknownAlgorithmError extends Error {
    readonly algorithm: string;

    constructor(algorithm: string) {
        super(`Unknown algorithm: ${algorithm}`);
        this.name = 'UnknownAlgorithmError';
        this.algorithm = algorithm;
    }
}

/** Raised when a freshly generated grid breaks its own accessibility guarantees. */
export class GenerationInvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GenerationInvariantError';
    }
}

export class RoverStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RoverStateError';
    }
}
