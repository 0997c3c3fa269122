/**
 * Small seeded PRNG (mulberry32). Same seed, same sequence, which keeps
 * terrain generation reproducible for regression tests.
 */
export class Prng {
    readonly seed: number;
    private state: number;

    constructor(seed: number) {
        this.seed = seed >>> 0;
        this.state = this.seed;
    }

    /** Float in [0, 1). */
    next(): number {
        this.state = (this.state + 0x6d2b79f5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /** True with probability `p`. */
    chance(p: number): boolean {
        return this.next() < p;
    }
}

export function randomSeed(): number {
    return Math.floor(Math.random() * 0x100000000);
}
