/** Random number generator interface for reproducible results */
export interface RandomGenerator {
    next(): number; // [0, 1)
    nextInt(max: number): number; // [0, max)
    seed(value: number): void;
}
