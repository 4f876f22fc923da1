import type { FilterThresholds, Seconds, SensorRecord, TiltAlgorithm } from '../core/types';

export interface RecordChunk {
    chunkIndex: number;
    recordCount: number;
    byteLength: number;
    format: 'ndjson';
    data: string; // NDJSON, newline-terminated
}

export type ExportFormat = 'json' | 'zip';

export interface ExportOptions {
    directory: string;
    algorithm: TiltAlgorithm;
    format?: ExportFormat;
    now?: Date;
    alpha?: number;
    thresholds?: FilterThresholds;
}

export type ExportResult =
    | { status: 'saved'; path: string; filename: string; recordCount: number; bytes: number }
    | { status: 'no_data'; message: string }
    | { status: 'error'; message: string };

export type LoadResult =
    | { success: true; data: SensorRecord[] }
    | { success: false; errors: string[] };

export interface ValidationResult {
    status: 'pass' | 'warn' | 'fail';
    errors: string[];
    warnings: string[];
    checkedAtIso: string;
    rulesVersion: string;
}

export interface RecordingMetadata {
    schemaVersion: string;
    app: {
        name: string;
        version: string;
    };
    algorithm: TiltAlgorithm;
    algorithmCounts: Record<TiltAlgorithm, number>;
    startTimestamp: Seconds;
    endTimestamp: Seconds;
    durationSeconds: number;
    recordCount: number;
    sampling: {
        nominalHz: number;
        observedHz: number;
        dtMsMedian: number | null;
        dtMsP95: number | null;
    };
    units: {
        timestamp: 's';
        accel: 'g';
        gyro: 'rad/s';
        angles: 'rad';
    };
    filter: {
        alpha: number;
        thresholds: FilterThresholds;
    };
    validation: ValidationResult;
    export?: {
        format: ExportFormat;
        createdAtIso: string;
        files: Array<{ name: string; bytes: number; sha256: string }>;
    };
}

export interface AxisStats {
    noise: number;
    bias: { x: number; y: number; z: number };
    biasLength: number;
}

export interface ImuAnalysisResult {
    sampleCount: number;
    accelerometer: AxisStats;
    gyroscope: AxisStats;
    series: {
        t: number[];
        pitch: number[];
        roll: number[];
    };
}

export type { SensorRecord } from '../core/types';
