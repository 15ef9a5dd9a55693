import { performance } from 'perf_hooks';

import { resolveAcoConfig } from '../../config';
import type {
    AlgorithmConfig,
    AlgorithmResultWithMetadata,
    Ant,
    City,
    ConvergenceUpdate,
    TourSolution,
    TspAlgorithm,
} from '../../types';
import { SeededRandom } from '../../utils/random';
import { Colony } from './colony';

export class AntColonyOptimization implements TspAlgorithm {
    name = 'aco';

    /**
     * Runs `iterations` rounds of spawn → construct → update, then moves one more batch
     * on the final pheromone trails. The best tour over every ant observed is returned,
     * earlier tours winning ties.
     */
    solve(cities: ReadonlyArray<City>, config: AlgorithmConfig): AlgorithmResultWithMetadata<TourSolution> {
        const { iterations, ...params } = resolveAcoConfig(config.acoConfig);
        const random = config.random ?? new SeededRandom(Date.now());
        const colony = new Colony(params, cities, config.distanceCalc);

        let best: TourSolution = { tour: [], length: Infinity };
        let fallbackSelections = 0;
        const history: ConvergenceUpdate[] = [];
        const startTime = performance.now();

        const runBatch = (iteration: number): Ant[] => {
            const ants = colony.initializeAnts(random);
            fallbackSelections += colony.antsMove(ants, random);

            for (const ant of ants) {
                const length = colony.tourLength(ant.tour);
                if (length < best.length) {
                    best = { tour: [...ant.tour], length };
                    history.push({ timeMs: performance.now() - startTime, iteration, bestLength: length });
                }
            }

            return ants;
        };

        for (let i = 0; i < iterations; ++i) {
            colony.updatePheromones(runBatch(i));
        }

        runBatch(iterations);

        return { solution: best, history, fallbackSelections };
    }
}
