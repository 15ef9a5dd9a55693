import type { City, DistanceCalculator } from '../types';

/**
 * Builds the full pairwise distance matrix for `cities`.
 * Only the upper triangle is computed, the lower one is mirrored from it,
 * so the result is symmetric with a zero diagonal for any calculator.
 */
export const buildDistanceMatrix = (cities: ReadonlyArray<City>, distanceCalc: DistanceCalculator): number[][] => {
    const n = cities.length;
    const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));

    for (let i = 0; i < n; ++i) {
        for (let j = i + 1; j < n; ++j) {
            const distance = distanceCalc(cities[i], cities[j]);
            matrix[i][j] = distance;
            matrix[j][i] = distance;
        }
    }

    return matrix;
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should mirror the upper triangle even for a one-way calculator', () => {
        const oneWay: DistanceCalculator = (from, to) => to.x - from.x;
        const cities: City[] = [
            { x: 0, y: 0 },
            { x: 2, y: 0 },
            { x: 7, y: 0 },
        ];

        expect(buildDistanceMatrix(cities, oneWay)).toEqual([
            [0, 2, 7],
            [2, 0, 5],
            [7, 5, 0],
        ]);
    });
}
