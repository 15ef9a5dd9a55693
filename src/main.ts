import { loadEnv } from './config';
import { formatSolution, runSimulation } from './simulation';
import { SeededRandom } from './utils/random';

async function main(): Promise<void> {
    const { ACO_SEED } = loadEnv();
    const { solution } = runSimulation(new SeededRandom(ACO_SEED ?? Date.now()));

    formatSolution(solution).forEach(line => console.log(line));
}

main().catch(error => {
    console.error('\nACO run failed:', error instanceof Error ? error.message : error);

    if (error instanceof Error && error.stack) {
        console.error('\nStack trace:');
        console.error(error.stack);
    }

    process.exit(1);
});
