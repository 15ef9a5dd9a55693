export { AntColonyOptimization } from './algorithms/aco';
export { Colony, MIN_DISTANCE } from './algorithms/aco/colony';
export { createAnt, isTourComplete, visitCity } from './algorithms/aco/ant';
export type { RandomGenerator } from './algorithms/interfaces';
export { AcoBenchmarkSuite } from './benchmark/suite';
export type { BenchmarkConfig, BenchmarkSummary } from './benchmark/suite';
export { DEFAULT_ACO_CONFIG, antColonyConfigSchema, citySchema, colonyParamsSchema, resolveAcoConfig } from './config';
export { ACO_ERRORS, DegenerateInputError } from './errors';
export { DEFAULT_CITIES, formatSolution, runSimulation } from './simulation';
export type * from './types';
export { buildDistanceMatrix } from './utils/DistanceMatrix';
export { euclideanDistanceCalculator } from './utils/euclideanDistanceCalculator';
export { SeededRandom } from './utils/random';
