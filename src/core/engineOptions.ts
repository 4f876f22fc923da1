import { z } from 'zod';
import { TILT_ALGORITHMS } from './types';
import { DEFAULT_THRESHOLDS } from './estimators';
import { TILT_CONFIG } from './tiltConfig';
import type { EngineOptions, FilterParams, Seconds, TiltAlgorithm } from './types';

export const TiltAlgorithmSchema = z.enum(TILT_ALGORITHMS);

const ThresholdsSchema = z.object({
    gyroRateEpsilon: z.number().nonnegative(),
    gravityMagnitude: z.number().positive(),
    gravityTolerance: z.number().nonnegative(),
    tiltAxisEpsilon: z.number().nonnegative(),
    accelMinMagnitude: z.number().nonnegative()
}).partial().strict();

export const EngineOptionsSchema = z.object({
    algorithm: TiltAlgorithmSchema.optional(),
    alpha: z.number().gt(0).lte(1).optional(),
    startTimestamp: z.number().finite().optional(),
    thresholds: ThresholdsSchema.optional()
}).strict();

export interface ResolvedEngineOptions {
    algorithm: TiltAlgorithm;
    params: FilterParams;
    startTimestamp: Seconds | null;
}

/**
 * Merges caller options over the defaults. Throws on invalid options,
 * listing every failing field.
 */
export const resolveEngineOptions = (options: EngineOptions = {}): ResolvedEngineOptions => {
    const result = EngineOptionsSchema.safeParse(options);
    if (!result.success) {
        const errors = result.error.errors.map(err => `${err.path.join('.') || 'options'}: ${err.message}`);
        throw new Error(`Invalid engine options: ${errors.join('; ')}`);
    }

    const parsed = result.data;
    return {
        algorithm: parsed.algorithm ?? TILT_CONFIG.defaultAlgorithm,
        params: {
            alpha: parsed.alpha ?? TILT_CONFIG.complementary.alpha,
            thresholds: { ...DEFAULT_THRESHOLDS, ...parsed.thresholds }
        },
        startTimestamp: parsed.startTimestamp ?? null
    };
};
