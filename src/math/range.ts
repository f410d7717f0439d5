import { RandomSource } from './random.js';
import { InvalidRangeError } from './errors.js';

/**
 * One uniform integer in [low, high], both ends included.
 */
export function rollRangeFrom(source: RandomSource, low: number, high: number): number {
    if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high)) {
        throw new InvalidRangeError(low, high, `Range bounds must be safe integers, got ${low} and ${high}`);
    }
    if (low > high) {
        throw new InvalidRangeError(low, high);
    }
    if (high - low >= Number.MAX_SAFE_INTEGER) {
        throw new InvalidRangeError(low, high, `Range ${low}..${high} is too wide`);
    }
    return source.int(low, high);
}
