import { createEngine } from './index';
import type { EngineOptions, SensorRecord, TiltAlgorithm } from './types';
import type { Clock, SensorProvider } from '../sensors/sensorTypes';

/**
 * Re-runs the raw columns of a recording through a fresh engine with the
 * given algorithm, so strategies can be compared on identical input.
 * The first record seeds the clock (dt = 0 on that sample).
 */
export const replayRecording = (
    records: SensorRecord[],
    algorithm: TiltAlgorithm,
    options: Omit<EngineOptions, 'algorithm' | 'startTimestamp'> = {}
): SensorRecord[] => {
    if (records.length === 0) return [];

    const engine = createEngine({ ...options, algorithm, startTimestamp: records[0].timestamp });
    return records.map(r => engine.processSample({
        timestamp: r.timestamp,
        accelerometer: r.accelerometer,
        gyroscope: r.gyroscope
    }).record);
};

export interface ReplaySource {
    provider: SensorProvider;
    clock: Clock;
    remaining(): number;
}

/**
 * Exposes a recording as a provider/clock pair for the tick driver.
 * `clock.now()` reports the timestamp of the record most recently read;
 * once the records run out the provider reports unavailability.
 */
export const createReplaySource = (records: SensorRecord[]): ReplaySource => {
    let index = 0;
    let current: SensorRecord | null = null;

    const provider: SensorProvider = {
        read: () => {
            if (index >= records.length) return null;
            current = records[index++];
            return { accelerometer: current.accelerometer, gyroscope: current.gyroscope };
        }
    };

    const clock: Clock = {
        now: () => current?.timestamp ?? (records[0]?.timestamp ?? 0)
    };

    return { provider, clock, remaining: () => records.length - index };
};
