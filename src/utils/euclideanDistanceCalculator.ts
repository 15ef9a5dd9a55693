import type { DistanceCalculator } from '../types';

export const euclideanDistanceCalculator: DistanceCalculator = (from, to) => {
    return Math.sqrt(Math.pow(from.x - to.x, 2) + Math.pow(from.y - to.y, 2));
};

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should compute 3-4-5 triangle hypotenuse', () => {
        expect(euclideanDistanceCalculator({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });

    test('should be zero for coincident points', () => {
        expect(euclideanDistanceCalculator({ x: 2, y: -7 }, { x: 2, y: -7 })).toBe(0);
    });
}
