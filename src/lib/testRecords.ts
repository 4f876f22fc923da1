import type { SensorRecord } from '../core/types';

/** Level, stationary record at the given timestamp. */
export const makeRecord = (timestamp: number, overrides: Partial<SensorRecord> = {}): SensorRecord => ({
    timestamp,
    accelerometer: { x: 0, y: 0, z: -1 },
    gyroscope: { x: 0, y: 0, z: 0 },
    orientation: { pitch: 0, roll: 0 },
    algorithm: 'complementary_filter',
    ...overrides
});

/** Evenly spaced records starting at `start`, 20 ms apart. */
export const makeSession = (count: number, start: number = 0): SensorRecord[] => {
    return Array.from({ length: count }, (_, i) => makeRecord(start + i * 0.02));
};
