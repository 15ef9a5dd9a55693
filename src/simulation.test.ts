import { describe, it, expect } from 'vitest';
import { DEFAULT_CITIES, formatSolution, runSimulation } from './simulation';
import { SeededRandom } from './utils/random';

describe('Default simulation', () => {
    it('should format the best tour on two lines', () => {
        expect(formatSolution({ tour: [0, 1, 2, 3, 4], length: 5.5 })).toEqual([
            'Best tour: [0, 1, 2, 3, 4]',
            'Best tour length: 5.5',
        ]);
    });

    it('should visit all five cities with a finite length', () => {
        const { solution } = runSimulation(new SeededRandom(2026));

        expect([...solution.tour].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4]);
        expect(solution.tour).toHaveLength(DEFAULT_CITIES.length);
        expect(Number.isFinite(solution.length)).toBe(true);
    });

    it('should repeat itself for the same seed', () => {
        expect(runSimulation(new SeededRandom(9)).solution).toEqual(runSimulation(new SeededRandom(9)).solution);
    });
});
