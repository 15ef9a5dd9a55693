/**
 * Colony engine for Ant Colony Optimization over a TSP instance.
 *
 * The colony owns the distance matrix (fixed at construction) and the pheromone
 * matrix (mutated only by `updatePheromones`). Ants are plain values created per
 * batch; every operation that needs randomness takes the generator explicitly, so
 * a seeded generator reproduces a run exactly.
 *
 * Tours are open paths: no edge is laid or measured from the last city back to the first.
 */

import cloneDeep from 'lodash/cloneDeep.js';

import { citiesSchema, colonyParamsSchema, parseInput } from '../../config';
import { ACO_ERRORS } from '../../errors';
import type { Ant, City, CitySelection, ColonyParams, DistanceCalculator, DistanceMatrix } from '../../types';
import { buildDistanceMatrix } from '../../utils/DistanceMatrix';
import { euclideanDistanceCalculator } from '../../utils/euclideanDistanceCalculator';
import type { RandomGenerator } from '../interfaces';
import { createAnt, isTourComplete, visitCity } from './ant';

// Distances below this are clamped when computing the 1/d heuristic, keeping coincident cities finite
export const MIN_DISTANCE = 1e-6;

export class Colony {
    readonly params: Readonly<ColonyParams>;
    readonly cityCount: number;

    private readonly distances: number[][];
    private readonly pheromones: number[][];

    /** @throws DegenerateInputError when the parameters are out of range or fewer than 2 cities are given */
    constructor(
        params: ColonyParams,
        cities: ReadonlyArray<City>,
        distanceCalc: DistanceCalculator = euclideanDistanceCalculator,
    ) {
        this.params = parseInput(colonyParamsSchema, params, 'params');
        const validCities = parseInput(citiesSchema, cities, 'cities');

        this.cityCount = validCities.length;
        this.distances = buildDistanceMatrix(validCities, distanceCalc);
        this.pheromones = Array.from({ length: this.cityCount }, () => new Array<number>(this.cityCount).fill(0));
    }

    /** One ant per configured ant, each on a uniformly drawn start city (with replacement) */
    initializeAnts(random: RandomGenerator): Ant[] {
        return Array.from({ length: this.params.antCount }, () =>
            createAnt(random.nextInt(this.cityCount), this.cityCount),
        );
    }

    /**
     * Roulette-wheel choice of the ant's next city, weighting every unvisited city `i` by
     * `pheromone[c][i]^alpha * (1 / distance[c][i])^beta`.
     *
     * When the weights sum to zero (or overflow), the nearest unvisited city is returned
     * as a `fallback` selection instead of drawing.
     */
    nextCity(ant: Ant, random: RandomGenerator): CitySelection {
        if (ant.tour.length === 0 || isTourComplete(ant)) {
            throw new Error(`${ACO_ERRORS.INCOMPLETE_TOUR_REQUIRED}: ant must have a started, unfinished tour`);
        }

        const current = ant.tour[ant.tour.length - 1];
        const weights = new Array<number>(this.cityCount).fill(0);
        let total = 0;

        for (let i = 0; i < this.cityCount; ++i) {
            if (!ant.visited[i]) {
                weights[i] = this.desirability(current, i);
                total += weights[i];
            }
        }

        if (!(total > 0) || !Number.isFinite(total)) {
            return { type: 'fallback', city: this.nearestUnvisited(ant, current) };
        }

        const roulette = random.next() * total;
        let cumulative = 0;

        for (let i = 0; i < this.cityCount; ++i) {
            if (!ant.visited[i] && weights[i] > 0) {
                cumulative += weights[i];
                if (cumulative >= roulette) {
                    return { type: 'roulette', city: i };
                }
            }
        }

        // round-off left the walk short of the draw
        return { type: 'fallback', city: this.nearestUnvisited(ant, current) };
    }

    /**
     * Completes every ant's tour in place.
     * @returns how many selections fell back to the nearest unvisited city
     */
    antsMove(ants: ReadonlyArray<Ant>, random: RandomGenerator): number {
        let fallbacks = 0;

        for (const ant of ants) {
            while (!isTourComplete(ant)) {
                const selection = this.nextCity(ant, random);
                if (selection.type === 'fallback') {
                    ++fallbacks;
                }
                visitCity(ant, selection.city);
            }
        }

        return fallbacks;
    }

    /**
     * Evaporates the whole matrix, then lets every ant deposit `Q / tourLength` on both
     * directions of each edge it walked. Zero-length tours deposit nothing.
     */
    updatePheromones(ants: ReadonlyArray<Ant>): void {
        const retention = 1 - this.params.rho;

        for (const row of this.pheromones) {
            for (let j = 0; j < row.length; ++j) {
                row[j] *= retention;
            }
        }

        for (const ant of ants) {
            const length = this.tourLength(ant.tour);
            if (!(length > 0) || !Number.isFinite(length)) {
                continue;
            }

            const deposit = this.params.q / length;
            for (let i = 0; i < ant.tour.length - 1; ++i) {
                const from = ant.tour[i];
                const to = ant.tour[i + 1];
                this.pheromones[from][to] += deposit;
                this.pheromones[to][from] += deposit;
            }
        }
    }

    tourLength(tour: ReadonlyArray<number>): number {
        let length = 0;
        for (let i = 0; i < tour.length - 1; ++i) {
            length += this.distances[tour[i]][tour[i + 1]];
        }
        return length;
    }

    getPheromones(): number[][] {
        return cloneDeep(this.pheromones);
    }

    getDistances(): DistanceMatrix {
        return this.distances;
    }

    private desirability(from: number, to: number): number {
        const heuristic = 1 / Math.max(this.distances[from][to], MIN_DISTANCE);
        return Math.pow(this.pheromones[from][to], this.params.alpha) * Math.pow(heuristic, this.params.beta);
    }

    // Ties go to the lowest index
    private nearestUnvisited(ant: Ant, current: number): number {
        let nearest = -1;
        let nearestDistance = Infinity;

        for (let i = 0; i < this.cityCount; ++i) {
            if (!ant.visited[i] && (nearest === -1 || this.distances[current][i] < nearestDistance)) {
                nearest = i;
                nearestDistance = this.distances[current][i];
            }
        }

        return nearest;
    }
}
