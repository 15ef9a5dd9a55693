import type { RandomGenerator } from './algorithms/interfaces';

/** City on a 2D plane, identified by its index in the city list */
export interface City {
    readonly x: number;
    readonly y: number;
}

export type DistanceCalculator = (from: City, to: City) => number;

export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** Parameters owned by a colony for its whole lifetime */
export interface ColonyParams {
    antCount: number;
    alpha: number; // pheromone exponent
    beta: number; // inverse-distance exponent
    rho: number; // evaporation rate in [0; 1]
    q: number; // deposit scale
}

export interface AntColonyConfig extends ColonyParams {
    iterations: number;
}

export interface AlgorithmConfig {
    distanceCalc: DistanceCalculator;
    random?: RandomGenerator;
    acoConfig?: Partial<AntColonyConfig>; // Optional override
}

/** Transient agent; `visited` is indexed by city */
export interface Ant {
    tour: number[];
    visited: boolean[];
}

export type CitySelection =
    | { type: 'roulette'; city: number }
    // No candidate had a usable weight, nearest unvisited city was taken instead
    | { type: 'fallback'; city: number };

export interface TourSolution {
    tour: number[];
    length: number;
}

export interface ConvergenceUpdate {
    timeMs: number;
    iteration: number;
    bestLength: number;
}

export interface AlgorithmResultWithMetadata<T> {
    solution: T;
    history: ConvergenceUpdate[];
    fallbackSelections: number;
}

export interface Algorithm<T> {
    name: string;
    solve: (cities: ReadonlyArray<City>, config: AlgorithmConfig) => T;
}

export type TspAlgorithm = Algorithm<AlgorithmResultWithMetadata<TourSolution>>;
