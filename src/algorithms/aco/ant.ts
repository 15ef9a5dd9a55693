import type { Ant } from '../../types';

export const createAnt = (startCity: number, cityCount: number): Ant => {
    const visited = new Array<boolean>(cityCount).fill(false);
    visited[startCity] = true;

    return { tour: [startCity], visited };
};

export const visitCity = (ant: Ant, city: number): void => {
    ant.tour.push(city);
    ant.visited[city] = true;
};

export const isTourComplete = (ant: Ant): boolean => ant.tour.length >= ant.visited.length;

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should start with a single visited city', () => {
        const ant = createAnt(2, 4);

        expect(ant.tour).toEqual([2]);
        expect(ant.visited).toEqual([false, false, true, false]);
        expect(isTourComplete(ant)).toBe(false);
    });

    test('should keep tour and visited flags in sync', () => {
        const ant = createAnt(0, 2);
        visitCity(ant, 1);

        expect(ant.tour).toEqual([0, 1]);
        expect(ant.visited).toEqual([true, true]);
        expect(isTourComplete(ant)).toBe(true);
    });
}
