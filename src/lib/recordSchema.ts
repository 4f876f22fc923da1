import { z } from 'zod';
import { TiltAlgorithmSchema } from '../core/engineOptions';
import type { LoadResult } from '../types';

/**
 * Zod schema for the recording wire format.
 * Field names are stable; exports and imports both go through it.
 */

const Vector3Schema = z.object({
    x: z.number(),
    y: z.number(),
    z: z.number(),
});

export const SensorRecordSchema = z.object({
    timestamp: z.number(),
    accelerometer: Vector3Schema,
    gyroscope: Vector3Schema,
    orientation: z.object({
        pitch: z.number(),
        roll: z.number(),
    }),
    algorithm: TiltAlgorithmSchema,
});

export const RecordingSchema = z.array(SensorRecordSchema);

/**
 * Validate parsed recording data against the wire schema
 */
export function validateRecordingSchema(data: unknown): LoadResult {
    const result = RecordingSchema.safeParse(data);

    if (result.success) {
        return { success: true, data: result.data };
    }

    const errors = result.error.errors.map(err => {
        const path = err.path.join('.');
        return `${path || '(root)'}: ${err.message}`;
    });

    return { success: false, errors };
}

/**
 * Quick check if a single record matches the wire schema
 */
export function isSensorRecord(value: unknown): boolean {
    return SensorRecordSchema.safeParse(value).success;
}
