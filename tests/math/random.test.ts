import { SeededRandom } from '../../src/math/random.js';

describe('SeededRandom', () => {
    it('should replay the same sequence for the same seed', () => {
        const a = new SeededRandom('test-seed');
        const b = new SeededRandom('test-seed');

        const drawsA = Array.from({ length: 20 }, () => a.int(1, 100));
        const drawsB = Array.from({ length: 20 }, () => b.int(1, 100));

        expect(drawsA).toEqual(drawsB);
        expect(a.seed).toBe('test-seed');
    });

    it('should make up a seed when none is given', () => {
        const a = new SeededRandom();
        const b = new SeededRandom();

        expect(a.seed.length).toBeGreaterThan(0);
        expect(a.seed).not.toBe(b.seed);
    });

    it('should cover the closed interval', () => {
        const rng = new SeededRandom('coverage');
        const seen = new Set<number>();

        for (let i = 0; i < 2000; i++) {
            const value = rng.int(-5, 5);
            expect(value).toBeGreaterThanOrEqual(-5);
            expect(value).toBeLessThanOrEqual(5);
            expect(Number.isInteger(value)).toBe(true);
            seen.add(value);
        }

        expect(seen.size).toBe(11);
    });

    it('should return the only value of a single-point interval', () => {
        const rng = new SeededRandom('single');
        expect(rng.int(3, 3)).toBe(3);
        expect(rng.int(-7, -7)).toBe(-7);
    });
});
