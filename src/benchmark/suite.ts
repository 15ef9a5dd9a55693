import { writeFile } from 'fs/promises';
import { performance } from 'perf_hooks';
import z from 'zod';

import { AntColonyOptimization } from '../algorithms/aco';
import { parseInput } from '../config';
import type { AntColonyConfig, City, DistanceCalculator, TspAlgorithm } from '../types';
import { euclideanDistanceCalculator } from '../utils/euclideanDistanceCalculator';
import { SeededRandom } from '../utils/random';

/** Benchmark configuration */
export interface BenchmarkConfig {
    readonly runs: number;
    readonly cities: ReadonlyArray<City>;
    readonly acoConfig?: Partial<AntColonyConfig>;
    readonly distanceCalc?: DistanceCalculator;
}

/** Statistical summary of multiple seeded runs */
export interface BenchmarkSummary {
    readonly algorithmName: string;
    readonly cityCount: number;
    readonly runs: number;
    readonly avgExecutionTime: number;
    readonly stdExecutionTime: number;
    readonly avgTourLength: number;
    readonly stdTourLength: number;
    readonly bestTourLength: number;
    readonly worstTourLength: number;
    readonly bestTour: ReadonlyArray<number>;
}

const runsSchema = z.number().int().positive();

export class AcoBenchmarkSuite {
    constructor(private readonly algorithm: TspAlgorithm = new AntColonyOptimization()) {}

    run(config: BenchmarkConfig): BenchmarkSummary {
        const runs = parseInput(runsSchema, config.runs, 'runs');
        const distanceCalc = config.distanceCalc ?? euclideanDistanceCalculator;

        console.log(`Running ${this.algorithm.name} on ${config.cities.length} cities (${runs} runs)`);

        const times: number[] = [];
        const lengths: number[] = [];
        let bestTour: number[] = [];
        let bestTourLength = Infinity;

        for (let run = 0; run < runs; run++) {
            const start = performance.now();
            const { solution } = this.algorithm.solve(config.cities, {
                distanceCalc,
                random: new SeededRandom(run), // Reproducible, different runs
                acoConfig: config.acoConfig,
            });
            times.push(performance.now() - start);
            lengths.push(solution.length);

            if (solution.length < bestTourLength) {
                bestTourLength = solution.length;
                bestTour = solution.tour;
            }
        }

        return {
            algorithmName: this.algorithm.name,
            cityCount: config.cities.length,
            runs,
            avgExecutionTime: this.average(times),
            stdExecutionTime: this.std(times),
            avgTourLength: this.average(lengths),
            stdTourLength: this.std(lengths),
            bestTourLength,
            worstTourLength: Math.max(...lengths),
            bestTour,
        };
    }

    async exportResults(summary: BenchmarkSummary, outputPath: string): Promise<void> {
        try {
            await writeFile(outputPath, JSON.stringify(summary, null, 4));
        } catch (error) {
            console.error(`Failed to export benchmark results to ${outputPath}`);
            throw error;
        }
    }

    private average(values: ReadonlyArray<number>): number {
        return values.reduce((sum, v) => sum + v, 0) / values.length;
    }

    private std(values: ReadonlyArray<number>): number {
        const avg = this.average(values);
        const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
        return Math.sqrt(variance);
    }
}
