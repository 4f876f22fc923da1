export type Seconds = number;

export interface Vector3 {
    x: number;
    y: number;
    z: number;
}

/**
 * Hamilton quaternion q = w + xi + yj + zk.
 * Treated as a value: operations return new quaternions and never mutate their inputs.
 */
export interface Quaternion {
    readonly w: number;
    readonly x: number;
    readonly y: number;
    readonly z: number;
}

export const TILT_ALGORITHMS = [
    'accelerometer_only',
    'gyroscope_only',
    'complementary_filter'
] as const;

export type TiltAlgorithm = typeof TILT_ALGORITHMS[number];

/** One tick of raw input: accelerometer in g, gyroscope in rad/s. */
export interface SensorSample {
    timestamp: Seconds;
    accelerometer: Vector3;
    gyroscope: Vector3;
}

export interface TiltAngles {
    pitch: number;
    roll: number;
}

export interface TiltEstimate extends TiltAngles {
    algorithm: TiltAlgorithm;
}

/**
 * Filter state owned by one engine.
 * `gyroPitch`/`gyroRoll` belong to the gyroscope-only strategy,
 * `currentOrientation` to the complementary filter.
 */
export interface OrientationState {
    currentOrientation: Quaternion;
    gyroPitch: number;
    gyroRoll: number;
}

export type PropagationOutcome = 'applied' | 'skipped_negligible_rate';

export type CorrectionOutcome = 'applied' | 'skipped_linear_acceleration' | 'skipped_aligned';

export interface ComplementarySteps {
    propagation: PropagationOutcome;
    correction: CorrectionOutcome;
}

export interface FilterThresholds {
    gyroRateEpsilon: number;
    gravityMagnitude: number;
    gravityTolerance: number;
    tiltAxisEpsilon: number;
    accelMinMagnitude: number;
}

export interface FilterParams {
    alpha: number;
    thresholds: FilterThresholds;
}

/** Wire record, one per processed sample while recording. */
export interface SensorRecord {
    timestamp: Seconds;
    accelerometer: Vector3;
    gyroscope: Vector3;
    orientation: TiltAngles;
    algorithm: TiltAlgorithm;
}

export interface TickResult {
    estimate: TiltEstimate;
    record: SensorRecord;
    dt: Seconds;
    steps?: ComplementarySteps;
}

export type TickOutcome =
    | ({ status: 'processed' } & TickResult)
    | { status: 'skipped'; reason: 'sensor_unavailable' };

export interface EngineOptions {
    algorithm?: TiltAlgorithm;
    alpha?: number;
    startTimestamp?: Seconds;
    thresholds?: Partial<FilterThresholds>;
}

export interface EngineStats {
    processedTicks: number;
    skippedTicks: number;
    correctionsApplied: number;
    correctionsRejected: number;
    recordsCaptured: number;
    cadence: {
        samplesCount: number;
        observedHz: number;
        dtMsMedian: number | null;
        dtMsP95: number | null;
    };
}
