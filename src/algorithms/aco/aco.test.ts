import { describe, it, expect } from 'vitest';
import { AntColonyOptimization } from './index';
import { DegenerateInputError } from '../../errors';
import { SeededRandom } from '../../utils/random';
import { euclideanDistanceCalculator } from '../../utils/euclideanDistanceCalculator';
import type { RandomGenerator } from '../interfaces';
import type { AntColonyConfig, City } from '../../types';

const fixedRandom = (value: number): RandomGenerator => ({
    next: () => value,
    nextInt: max => Math.floor(value * max),
    seed: () => undefined,
});

// Replays the given draws in order, both for next() and nextInt()
const scriptedRandom = (values: number[]): RandomGenerator => {
    let call = 0;
    const next = () => values[call++ % values.length];
    return { next, nextInt: max => Math.floor(next() * max), seed: () => undefined };
};

const collinear: City[] = [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 2, y: 0 },
];

const diagonal: City[] = [0, 1, 2, 3, 4].map(i => ({ x: i, y: i }));

const singleAntConfig: Partial<AntColonyConfig> = { antCount: 1, alpha: 1, beta: 2, rho: 0.5, q: 10, iterations: 1 };

const isPermutation = (tour: number[], n: number) =>
    [...tour].sort((a, b) => a - b).every((city, i) => city === i) && tour.length === n;

describe('Ant Colony Optimization', () => {
    it('should find the 2.0 tour over collinear cities when starting at an endpoint', () => {
        const result = new AntColonyOptimization().solve(collinear, {
            distanceCalc: euclideanDistanceCalculator,
            random: fixedRandom(0),
            acoConfig: singleAntConfig,
        });

        expect(result.solution).toEqual({ tour: [0, 1, 2], length: 2 });
        expect(result.history).toHaveLength(1);
        expect(result.history[0].iteration).toBe(0);
        expect(result.history[0].bestLength).toBe(2);
        // both picks of the first batch fall back, the final batch draws on deposited trails
        expect(result.fallbackSelections).toBe(2);
    });

    it('should report 3.0 over collinear cities when every ant starts in the middle', () => {
        const result = new AntColonyOptimization().solve(collinear, {
            distanceCalc: euclideanDistanceCalculator,
            random: fixedRandom(0.5),
            acoConfig: singleAntConfig,
        });

        expect(result.solution).toEqual({ tour: [1, 0, 2], length: 3 });
    });

    it('should keep an earlier tour when the final batch does worse', () => {
        // iteration 0 starts at city 0 (0 -> 1 -> 2), the final batch starts in the middle (1 -> 0 -> 2)
        const result = new AntColonyOptimization().solve(collinear, {
            distanceCalc: euclideanDistanceCalculator,
            random: scriptedRandom([0, 0.5, 0.1]),
            acoConfig: singleAntConfig,
        });

        expect(result.solution).toEqual({ tour: [0, 1, 2], length: 2 });
        expect(result.history.map(update => update.iteration)).toEqual([0]);
        // two fallbacks in iteration 0, one from city 0 in the final batch
        expect(result.fallbackSelections).toBe(3);
    });

    it('should run the default parameters on the diagonal cities', () => {
        const result = new AntColonyOptimization().solve(diagonal, {
            distanceCalc: euclideanDistanceCalculator,
            random: new SeededRandom(1),
        });

        expect(isPermutation(result.solution.tour, diagonal.length)).toBe(true);
        expect(Number.isFinite(result.solution.length)).toBe(true);
        expect(result.solution.length).toBeGreaterThanOrEqual(4 * Math.SQRT2 - 1e-9);
    });

    it('should only record improving tours in history', () => {
        const result = new AntColonyOptimization().solve(diagonal, {
            distanceCalc: euclideanDistanceCalculator,
            random: new SeededRandom(8),
            acoConfig: { iterations: 20 },
        });

        for (let i = 1; i < result.history.length; ++i) {
            expect(result.history[i].bestLength).toBeLessThan(result.history[i - 1].bestLength);
            expect(result.history[i].iteration).toBeGreaterThanOrEqual(result.history[i - 1].iteration);
        }
        expect(result.history[result.history.length - 1].bestLength).toBe(result.solution.length);
    });

    it('should be deterministic for a fixed seed', () => {
        const solve = () =>
            new AntColonyOptimization().solve(diagonal, {
                distanceCalc: euclideanDistanceCalculator,
                random: new SeededRandom(77),
                acoConfig: { iterations: 15 },
            });

        const first = solve();
        const second = solve();

        expect(second.solution).toEqual(first.solution);
        expect(second.fallbackSelections).toBe(first.fallbackSelections);
    });

    it('should still report the final batch when no iterations run', () => {
        const result = new AntColonyOptimization().solve(diagonal, {
            distanceCalc: euclideanDistanceCalculator,
            random: new SeededRandom(3),
            acoConfig: { iterations: 0 },
        });

        expect(isPermutation(result.solution.tour, diagonal.length)).toBe(true);
        expect(result.history.every(update => update.iteration === 0)).toBe(true);
    });

    it('should finish with a finite length when cities coincide', () => {
        const cities: City[] = [
            { x: 0, y: 0 },
            { x: 0, y: 0 },
            { x: 1, y: 1 },
            { x: 2, y: 2 },
        ];

        const result = new AntColonyOptimization().solve(cities, {
            distanceCalc: euclideanDistanceCalculator,
            random: new SeededRandom(3),
        });

        expect(isPermutation(result.solution.tour, cities.length)).toBe(true);
        expect(Number.isFinite(result.solution.length)).toBe(true);
        expect(result.history.every(update => Number.isFinite(update.bestLength))).toBe(true);
    });

    it('should reject a colony of 0 ants', () => {
        expect(() =>
            new AntColonyOptimization().solve(diagonal, {
                distanceCalc: euclideanDistanceCalculator,
                acoConfig: { antCount: 0 },
            }),
        ).toThrowError(DegenerateInputError);
    });

    it('should reject a single city', () => {
        expect(() =>
            new AntColonyOptimization().solve([{ x: 0, y: 0 }], { distanceCalc: euclideanDistanceCalculator }),
        ).toThrowError(DegenerateInputError);
    });
});
