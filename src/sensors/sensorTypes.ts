import type { Seconds, Vector3 } from '../core/types';

/** Latest readings from the hardware layer, accelerometer in g and gyroscope in rad/s. */
export interface SensorReading {
    accelerometer: Vector3;
    gyroscope: Vector3;
}

/**
 * Supplies the most recent readings on demand.
 * Returns null while either sensor is unavailable; that tick is then skipped.
 */
export interface SensorProvider {
    read(): SensorReading | null;
}

/** Monotonic time source in seconds. */
export interface Clock {
    now(): Seconds;
}

export interface TickHealth {
    samplesCount: number;
    observedHz: number;
    dtMsMedian: number | null;
    dtMsP95: number | null;
    lastTimestamp: Seconds | null;
}
