import seedrandom from 'seedrandom';
import { randomUUID } from 'crypto';

/**
 * Source of uniform random integers. The evaluator and the range roller both
 * draw from one of these, so tests can substitute a fixed sequence.
 */
export interface RandomSource {
    /** Seed the sequence was built from, when there is one. */
    readonly seed?: string;

    /** Uniform integer in the closed interval [low, high]. */
    int(low: number, high: number): number;
}

export class SeededRandom implements RandomSource {
    private rng: seedrandom.PRNG;
    readonly seed: string;

    constructor(seed?: string) {
        this.seed = seed ?? randomUUID();
        this.rng = seedrandom(this.seed);
    }

    int(low: number, high: number): number {
        return low + Math.floor(this.rng() * (high - low + 1));
    }
}

/** Hands out a new source for every evaluation. */
export type SourceFactory = () => RandomSource;

/**
 * A fresh SeededRandom per call. The first is seeded with `seed` itself and
 * later ones with `seed#1`, `seed#2`, ..., so every roll can be replayed from
 * the seed it reports.
 */
export function seededSources(seed: string = randomUUID()): SourceFactory {
    let n = 0;
    return () => {
        const next = n === 0 ? seed : `${seed}#${n}`;
        n++;
        return new SeededRandom(next);
    };
}
