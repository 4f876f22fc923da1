import { createHash } from 'node:crypto';
import pkg from '../../package.json';
import { TILT_CONFIG } from '../core/tiltConfig';
import { DEFAULT_FILTER_PARAMS } from '../core/estimators';
import { computeIntervalStats } from '../core/stats';
import { validateRecording } from './recordingValidator';
import type { FilterThresholds, SensorRecord, TiltAlgorithm } from '../core/types';
import type { ExportFormat, RecordingMetadata } from '../types';

const SCHEMA_VERSION = "1.0";

export interface MetadataOptions {
    algorithm: TiltAlgorithm;
    alpha?: number;
    thresholds?: FilterThresholds;
    now?: Date;
    appVersion?: string;
}

/**
 * Build metadata describing a finished recording.
 * Timing is derived from the record timestamps, never from the wall clock.
 */
export function buildRecordingMetadata(
    records: SensorRecord[],
    options: MetadataOptions
): RecordingMetadata {
    const { algorithm, now = new Date(), appVersion = pkg.version } = options;
    const startTimestamp = records.length > 0 ? records[0].timestamp : 0;
    const endTimestamp = records.length > 0 ? records[records.length - 1].timestamp : 0;
    const durationSeconds = Number(Math.max(0, endTimestamp - startTimestamp).toFixed(6));

    const algorithmCounts: Record<TiltAlgorithm, number> = {
        accelerometer_only: 0,
        gyroscope_only: 0,
        complementary_filter: 0
    };
    for (const record of records) {
        algorithmCounts[record.algorithm]++;
    }

    const timing = computeIntervalStats(records.map(r => r.timestamp));

    return {
        schemaVersion: SCHEMA_VERSION,
        app: {
            name: pkg.name,
            version: appVersion
        },
        algorithm,
        algorithmCounts,
        startTimestamp,
        endTimestamp,
        durationSeconds,
        recordCount: records.length,
        sampling: {
            nominalHz: TILT_CONFIG.sampling.rateHz,
            observedHz: timing.observedHz,
            dtMsMedian: timing.dtMsMedian,
            dtMsP95: timing.dtMsP95
        },
        units: {
            timestamp: 's',
            accel: 'g',
            gyro: 'rad/s',
            angles: 'rad'
        },
        filter: {
            alpha: options.alpha ?? DEFAULT_FILTER_PARAMS.alpha,
            thresholds: { ...(options.thresholds ?? DEFAULT_FILTER_PARAMS.thresholds) }
        },
        validation: validateRecording(records, now)
    };
}

/**
 * Compute SHA-256 hash of a payload
 */
export function computeSHA256(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Add export metadata describing one written payload
 */
export function addExportMetadata(
    metadata: RecordingMetadata,
    fileName: string,
    payload: string | Uint8Array,
    format: ExportFormat,
    now: Date = new Date()
): RecordingMetadata {
    const bytes = typeof payload === 'string' ? Buffer.byteLength(payload, 'utf8') : payload.byteLength;

    return {
        ...metadata,
        export: {
            format,
            createdAtIso: now.toISOString(),
            files: [{
                name: fileName,
                bytes,
                sha256: computeSHA256(payload)
            }]
        }
    };
}
