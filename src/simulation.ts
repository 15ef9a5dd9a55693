import { AntColonyOptimization } from './algorithms/aco';
import type { RandomGenerator } from './algorithms/interfaces';
import { DEFAULT_ACO_CONFIG } from './config';
import type { AlgorithmResultWithMetadata, City, TourSolution } from './types';
import { euclideanDistanceCalculator } from './utils/euclideanDistanceCalculator';

export const DEFAULT_CITIES: ReadonlyArray<City> = [
    { x: 0, y: 0 },
    { x: 1, y: 1 },
    { x: 2, y: 2 },
    { x: 3, y: 3 },
    { x: 4, y: 4 },
];

export const runSimulation = (random: RandomGenerator): AlgorithmResultWithMetadata<TourSolution> =>
    new AntColonyOptimization().solve(DEFAULT_CITIES, {
        distanceCalc: euclideanDistanceCalculator,
        random,
        acoConfig: DEFAULT_ACO_CONFIG,
    });

export const formatSolution = ({ tour, length }: TourSolution): string[] => [
    `Best tour: [${tour.join(', ')}]`,
    `Best tour length: ${length}`,
];
