import seedrandom from 'seedrandom';

import type { RandomGenerator } from '../algorithms/interfaces';

/** Seeded generator; equal seeds give equal sequences */
export class SeededRandom implements RandomGenerator {
    private prng: seedrandom.PRNG;

    constructor(seed: number) {
        this.prng = seedrandom(String(seed));
    }

    seed(value: number): void {
        this.prng = seedrandom(String(value));
    }

    next(): number {
        return this.prng();
    }

    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }
}

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    const take = (rng: SeededRandom, count: number) => Array.from({ length: count }, () => rng.next());

    test('should repeat the sequence for equal seeds', () => {
        expect(take(new SeededRandom(7), 20)).toEqual(take(new SeededRandom(7), 20));
    });

    test('should tell apart seeds that share their low 32 bits', () => {
        expect(take(new SeededRandom(5 + 2 ** 32), 5)).not.toEqual(take(new SeededRandom(5), 5));
    });

    test('should restart the sequence after reseeding', () => {
        const rng = new SeededRandom(123);
        const first = take(rng, 3);
        rng.seed(123);

        expect(take(rng, 3)).toEqual(first);
    });

    test('should stay within bounds', () => {
        const rng = new SeededRandom(99);
        for (let i = 0; i < 1000; ++i) {
            const value = rng.next();
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);

            const index = rng.nextInt(5);
            expect(Number.isInteger(index)).toBe(true);
            expect(index).toBeGreaterThanOrEqual(0);
            expect(index).toBeLessThan(5);
        }
    });
}
