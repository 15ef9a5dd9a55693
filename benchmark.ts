import path from 'path';
import { AcoBenchmarkSuite } from './src/benchmark/suite';
import { DEFAULT_ACO_CONFIG } from './src/config';
import { DEFAULT_CITIES } from './src/simulation';

const RUNS = 20;
const outputPath = path.resolve(process.cwd(), 'bench_results.json');

const main = async () => {
    const suite = new AcoBenchmarkSuite();
    const summary = suite.run({ runs: RUNS, cities: DEFAULT_CITIES, acoConfig: DEFAULT_ACO_CONFIG });

    console.log(
        `Average tour length ${summary.avgTourLength.toFixed(4)} (std ${summary.stdTourLength.toFixed(4)})\nBest tour length = ${summary.bestTourLength} via [${summary.bestTour.join(', ')}]\nWorst tour length = ${summary.worstTourLength}\nAverage execution time ${summary.avgExecutionTime.toFixed(2)}ms`,
    );

    await suite.exportResults(summary, outputPath);
    console.log(`Results written to ${outputPath}`);
};

main().catch(err => {
    console.error(err);
    process.exit(1);
});
