import type {
    EngineOptions,
    EngineStats,
    OrientationState,
    SensorRecord,
    SensorSample,
    Seconds,
    TickOutcome,
    TickResult,
    TiltAlgorithm,
    FilterParams
} from './types';
import { createOrientationState, snapshotOrientationState, switchAlgorithm } from './orientationState';
import type { AlgorithmSelection } from './orientationState';
import { runEstimator } from './estimators';
import { resolveEngineOptions } from './engineOptions';
import { SamplingHealthMonitor } from '../sensors/samplingStats';
import type { Clock, SensorProvider } from '../sensors/sensorTypes';
import { debugLog } from '../lib/debugLog';

/** Deep copy of a record with the wire key order. */
export const copySensorRecord = (r: SensorRecord): SensorRecord => ({
    timestamp: r.timestamp,
    accelerometer: { x: r.accelerometer.x, y: r.accelerometer.y, z: r.accelerometer.z },
    gyroscope: { x: r.gyroscope.x, y: r.gyroscope.y, z: r.gyroscope.z },
    orientation: { pitch: r.orientation.pitch, roll: r.orientation.roll },
    algorithm: r.algorithm
});

export interface TiltEngine {
    processSample(sample: SensorSample): TickResult;
    tick(provider: SensorProvider, clock: Clock): TickOutcome;
    switchAlgorithm(algorithm: TiltAlgorithm): void;
    getAlgorithm(): TiltAlgorithm;
    getParams(): FilterParams;
    getState(): Readonly<OrientationState>;
    startRecording(): void;
    stopRecording(): SensorRecord[];
    isRecording(): boolean;
    getRecords(): SensorRecord[];
    getStats(): EngineStats;
    reset(): void;
}

/**
 * Single-writer pipeline: every tick runs to completion before returning,
 * and the orientation state is touched by exactly one tick at a time.
 * Hosts that deliver ticks concurrently must serialize the calls.
 */
class TiltEngineV1 implements TiltEngine {
    private selection: AlgorithmSelection;
    private params: FilterParams;
    private initialTimestamp: Seconds | null;
    private lastTimestamp: Seconds | null;
    private recording = false;
    private records: SensorRecord[] = [];
    private cadence = new SamplingHealthMonitor();
    private counters = { processedTicks: 0, skippedTicks: 0, correctionsApplied: 0, correctionsRejected: 0 };

    constructor(options: EngineOptions = {}) {
        const resolved = resolveEngineOptions(options);
        this.selection = { algorithm: resolved.algorithm, state: createOrientationState() };
        this.params = resolved.params;
        this.initialTimestamp = resolved.startTimestamp;
        this.lastTimestamp = resolved.startTimestamp;
    }

    processSample(sample: SensorSample): TickResult {
        const dt = this.advanceClock(sample.timestamp);
        const { algorithm, state } = this.selection;

        const output = runEstimator(algorithm, state, sample, dt, this.params);
        if (output.steps) {
            if (output.steps.correction === 'applied') this.counters.correctionsApplied++;
            else if (output.steps.correction === 'skipped_linear_acceleration') this.counters.correctionsRejected++;
        }

        const record: SensorRecord = {
            timestamp: sample.timestamp,
            accelerometer: { x: sample.accelerometer.x, y: sample.accelerometer.y, z: sample.accelerometer.z },
            gyroscope: { x: sample.gyroscope.x, y: sample.gyroscope.y, z: sample.gyroscope.z },
            orientation: { pitch: output.pitch, roll: output.roll },
            algorithm
        };

        if (this.recording) {
            this.records.push(copySensorRecord(record));
        }

        this.counters.processedTicks++;
        this.cadence.record(sample.timestamp);

        const result: TickResult = {
            estimate: { pitch: output.pitch, roll: output.roll, algorithm },
            record,
            dt
        };
        if (output.steps) result.steps = output.steps;
        return result;
    }

    tick(provider: SensorProvider, clock: Clock): TickOutcome {
        const reading = provider.read();
        if (!reading) {
            this.counters.skippedTicks++;
            return { status: 'skipped', reason: 'sensor_unavailable' };
        }

        const result = this.processSample({
            timestamp: clock.now(),
            accelerometer: reading.accelerometer,
            gyroscope: reading.gyroscope
        });
        return { status: 'processed', ...result };
    }

    switchAlgorithm(algorithm: TiltAlgorithm): void {
        const previous = this.selection.algorithm;
        switchAlgorithm(this.selection, algorithm);
        debugLog.log(`Algorithm switched: ${previous} -> ${algorithm} (state reset)`);
    }

    getAlgorithm(): TiltAlgorithm {
        return this.selection.algorithm;
    }

    getParams(): FilterParams {
        return { alpha: this.params.alpha, thresholds: { ...this.params.thresholds } };
    }

    getState(): Readonly<OrientationState> {
        return snapshotOrientationState(this.selection.state);
    }

    startRecording(): void {
        this.records = [];
        this.recording = true;
        debugLog.log(`Recording started (${this.selection.algorithm})`);
    }

    stopRecording(): SensorRecord[] {
        this.recording = false;
        debugLog.log(`Recording stopped: ${this.records.length} records`);
        return this.records.map(copySensorRecord);
    }

    isRecording(): boolean {
        return this.recording;
    }

    getRecords(): SensorRecord[] {
        return this.records.map(copySensorRecord);
    }

    getStats(): EngineStats {
        const health = this.cadence.getStats();
        return {
            ...this.counters,
            recordsCaptured: this.records.length,
            cadence: {
                samplesCount: health.samplesCount,
                observedHz: health.observedHz,
                dtMsMedian: health.dtMsMedian,
                dtMsP95: health.dtMsP95
            }
        };
    }

    reset(): void {
        switchAlgorithm(this.selection, this.selection.algorithm);
        this.lastTimestamp = this.initialTimestamp;
        this.recording = false;
        this.records = [];
        this.cadence.reset();
        this.counters = { processedTicks: 0, skippedTicks: 0, correctionsApplied: 0, correctionsRejected: 0 };
    }

    private advanceClock(timestamp: Seconds): Seconds {
        const last = this.lastTimestamp;
        this.lastTimestamp = timestamp;
        if (last === null) return 0;

        const dt = timestamp - last;
        if (!Number.isFinite(dt) || dt < 0) {
            debugLog.warn(`Non-monotonic sample timestamp (${last} -> ${timestamp}); using dt=0`);
            return 0;
        }
        return dt;
    }
}

export const createEngine = (options?: EngineOptions): TiltEngine => {
    return new TiltEngineV1(options);
};
