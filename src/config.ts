import z from 'zod';

import { DegenerateInputError } from './errors';
import type { AntColonyConfig } from './types';

export const citySchema = z.object({
    x: z.number().finite(),
    y: z.number().finite(),
});

export const citiesSchema = citySchema.array().min(2, 'at least 2 cities are required');

export const colonyParamsSchema = z.object({
    antCount: z.number().int().positive(),
    alpha: z.number().finite().nonnegative(),
    beta: z.number().finite().nonnegative(),
    rho: z.number().min(0).max(1),
    q: z.number().finite().positive(),
});

export const antColonyConfigSchema = colonyParamsSchema.extend({
    iterations: z.number().int().nonnegative(),
});

export const envSchema = z.object({
    // blank counts as unset
    ACO_SEED: z
        .string()
        .trim()
        .regex(/^\d*$/, 'must be a non-negative integer')
        .transform(value => (value === '' ? undefined : Number(value)))
        .refine(value => value === undefined || Number.isSafeInteger(value), 'must be a safe integer')
        .optional(),
});

export type Env = z.infer<typeof envSchema>;

export const DEFAULT_ACO_CONFIG: AntColonyConfig = {
    antCount: 10,
    alpha: 1.0,
    beta: 2.0,
    rho: 0.5,
    q: 100.0,
    iterations: 100,
};

const formatIssues = (label: string, error: z.ZodError) =>
    error.issues.map(issue => `${[label, ...issue.path].join('.')}: ${issue.message}`);

/** Parses `value` against `schema`, rethrowing every violation as a single DegenerateInputError */
export const parseInput = <T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> => {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new DegenerateInputError(formatIssues(label, result.error));
    }
    return result.data;
};

export const loadEnv = (source: Record<string, string | undefined> = process.env): Env => {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        throw new Error(`Invalid environment: ${formatIssues('env', result.error).join('; ')}`);
    }
    return result.data;
};

export const resolveAcoConfig = (override: Partial<AntColonyConfig> = {}): AntColonyConfig =>
    parseInput(antColonyConfigSchema, { ...DEFAULT_ACO_CONFIG, ...override }, 'config');

if (import.meta.vitest) {
    const { test, expect } = import.meta.vitest;

    test('should merge partial override over defaults', () => {
        expect(resolveAcoConfig({ iterations: 5, rho: 0.1 })).toEqual({
            antCount: 10,
            alpha: 1,
            beta: 2,
            rho: 0.1,
            q: 100,
            iterations: 5,
        });
    });

    test('should reject negative iteration count', () => {
        expect(() => resolveAcoConfig({ iterations: -1 })).toThrowError(DegenerateInputError);
    });

    test('should coerce seed from environment string', () => {
        expect(envSchema.parse({ ACO_SEED: '42' })).toEqual({ ACO_SEED: 42 });
        expect(envSchema.parse({})).toEqual({});
        expect(envSchema.safeParse({ ACO_SEED: 'abc' }).success).toBe(false);
    });

    test('should describe a malformed seed', () => {
        expect(() => loadEnv({ ACO_SEED: '-3' })).toThrowError(
            'Invalid environment: env.ACO_SEED: must be a non-negative integer',
        );
        expect(() => loadEnv({ ACO_SEED: '1.5' })).toThrowError('env.ACO_SEED: must be a non-negative integer');
        expect(() => loadEnv({ ACO_SEED: '9'.repeat(20) })).toThrowError('env.ACO_SEED: must be a safe integer');
    });

    test('should treat a blank seed as unset', () => {
        expect(loadEnv({ ACO_SEED: '' }).ACO_SEED).toBeUndefined();
        expect(loadEnv({ ACO_SEED: '  ' }).ACO_SEED).toBeUndefined();
    });

    test('should keep seeds beyond 32 bits intact', () => {
        expect(loadEnv({ ACO_SEED: '4294967301' }).ACO_SEED).toBe(4294967301);
    });
}
