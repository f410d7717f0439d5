import { RandomSource } from '../src/math/random.js';

/**
 * Hands out a fixed list of values in order, wrapping at the end. Fails the
 * test if a value falls outside the range the caller asked for.
 */
export class SequenceSource implements RandomSource {
    readonly seed?: string;
    readonly calls: Array<[number, number]> = [];
    private values: number[];
    private index = 0;

    constructor(values: number[], seed?: string) {
        this.values = values;
        this.seed = seed;
    }

    int(low: number, high: number): number {
        this.calls.push([low, high]);
        const value = this.values[this.index % this.values.length];
        this.index++;
        if (value < low || value > high) {
            throw new Error(`SequenceSource value ${value} outside [${low}, ${high}]`);
        }
        return value;
    }
}

// For expressions that must not touch the random source at all
export const NoRandomSource: RandomSource = {
    int(low: number, high: number): number {
        throw new Error(`Unexpected draw in [${low}, ${high}]`);
    }
};
