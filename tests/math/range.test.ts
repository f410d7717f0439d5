import { rollRangeFrom } from '../../src/math/range.js';
import { InvalidRangeError } from '../../src/math/errors.js';
import { SeededRandom } from '../../src/math/random.js';
import { NoRandomSource, SequenceSource } from '../fixtures.js';

describe('rollRangeFrom', () => {
    it('should draw from the source over the requested bounds', () => {
        const source = new SequenceSource([7]);
        expect(rollRangeFrom(source, 2, 9)).toBe(7);
        expect(source.calls).toEqual([[2, 9]]);
    });

    it('should stay within the bounds', () => {
        const source = new SeededRandom('range-test');
        for (let i = 0; i < 500; i++) {
            const value = rollRangeFrom(source, -3, 3);
            expect(value).toBeGreaterThanOrEqual(-3);
            expect(value).toBeLessThanOrEqual(3);
        }
    });

    it('should reject low greater than high', () => {
        expect(() => rollRangeFrom(NoRandomSource, 5, 1)).toThrow(InvalidRangeError);
        expect(() => rollRangeFrom(NoRandomSource, 12, 1)).toThrow('Invalid range: low (12) is greater than high (1)');
    });

    it('should keep the bounds on the error', () => {
        let caught: unknown;
        try {
            rollRangeFrom(NoRandomSource, 5, 1);
        } catch (e) {
            caught = e;
        }

        expect(caught).toBeInstanceOf(InvalidRangeError);
        if (!(caught instanceof InvalidRangeError)) return;
        expect(caught.low).toBe(5);
        expect(caught.high).toBe(1);
        expect(caught.name).toBe('InvalidRangeError');
    });

    it('should reject bounds that are not safe integers', () => {
        expect(() => rollRangeFrom(NoRandomSource, 1.5, 3)).toThrow('Range bounds must be safe integers, got 1.5 and 3');
        expect(() => rollRangeFrom(NoRandomSource, 0, Number.POSITIVE_INFINITY)).toThrow(InvalidRangeError);
    });

    it('should reject ranges too wide to sample', () => {
        expect(() => rollRangeFrom(NoRandomSource, -Number.MAX_SAFE_INTEGER, Number.MAX_SAFE_INTEGER)).toThrow(InvalidRangeError);
    });
});
