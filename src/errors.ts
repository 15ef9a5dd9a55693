export const ACO_ERRORS = {
    DEGENERATE_INPUT: 'DEGENERATE_INPUT',
    INCOMPLETE_TOUR_REQUIRED: 'INCOMPLETE_TOUR_REQUIRED',
} as const;

/** Thrown when a colony or solver is built from input it cannot run on */
export class DegenerateInputError extends Error {
    readonly code = ACO_ERRORS.DEGENERATE_INPUT;

    constructor(readonly issues: ReadonlyArray<string>) {
        super(`Invalid colony input: ${issues.join('; ')}`);
        this.name = 'DegenerateInputError';
    }
}
