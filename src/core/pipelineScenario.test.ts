import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createEngine } from './index';
import { IDENTITY } from './quaternion';
import { debugLog } from '../lib/debugLog';
import type { SensorSample, Vector3 } from './types';
import type { Clock, SensorProvider, SensorReading } from '../sensors/sensorTypes';

const GRAVITY_DOWN: Vector3 = { x: 0, y: 0, z: -1 };
const STILL: Vector3 = { x: 0, y: 0, z: 0 };

const sampleAt = (timestamp: number, gyroscope: Vector3 = STILL, accelerometer: Vector3 = GRAVITY_DOWN): SensorSample => ({
    timestamp,
    accelerometer,
    gyroscope
});

describe('tilt engine pipeline scenario', () => {
    beforeEach(() => {
        debugLog.setEcho(false);
        debugLog.clear();
    });

    it('tracks a slow pitch rotation under gravity', () => {
        const engine = createEngine({ startTimestamp: 0 });
        const gyro = { x: 0.1, y: 0, z: 0 };

        const first = engine.processSample(sampleAt(0.02, gyro));
        const second = engine.processSample(sampleAt(0.04, gyro));
        const third = engine.processSample(sampleAt(0.06, gyro));

        expect(first.dt).toBeCloseTo(0.02, 12);
        expect(first.estimate.algorithm).toBe('complementary_filter');
        expect(first.estimate.pitch).toBeCloseTo(0.00196, 9);
        expect(Math.abs(first.estimate.pitch)).toBeLessThanOrEqual(0.002);
        expect(second.estimate.pitch).toBeCloseTo(0.0038808, 9);
        expect(third.estimate.pitch).toBeCloseTo(0.005763184, 9);

        for (const result of [first, second, third]) {
            expect(result.estimate.roll).toBeCloseTo(0, 9);
            expect(result.steps).toEqual({ propagation: 'applied', correction: 'applied' });
        }

        const stats = engine.getStats();
        expect(stats.processedTicks).toBe(3);
        expect(stats.correctionsApplied).toBe(3);
        expect(stats.correctionsRejected).toBe(0);
        expect(stats.cadence).toEqual({ samplesCount: 3, observedHz: 50, dtMsMedian: 20, dtMsP95: 20 });
    });

    it('uses dt = 0 for the first sample without a start timestamp', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only' });
        const first = engine.processSample(sampleAt(12.5, { x: 1, y: 1, z: 0 }));
        expect(first.dt).toBe(0);
        expect(first.estimate).toEqual({ pitch: 0, roll: 0, algorithm: 'gyroscope_only' });
        expect(first.steps).toBeUndefined();

        const second = engine.processSample(sampleAt(13, { x: 0.2, y: 0.4, z: 0 }));
        expect(second.dt).toBe(0.5);
        expect(second.estimate.pitch).toBeCloseTo(0.1, 12);
        expect(second.estimate.roll).toBeCloseTo(0.2, 12);
    });

    it('treats a backwards timestamp as dt = 0 and logs a warning', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only', startTimestamp: 0 });
        engine.processSample(sampleAt(1, { x: 0.1, y: 0, z: 0 }));
        const result = engine.processSample(sampleAt(0.5, { x: 0.1, y: 0, z: 0 }));

        expect(result.dt).toBe(0);
        expect(result.estimate.pitch).toBeCloseTo(0.1, 12);
        expect(debugLog.getLogs()[0]).toMatchObject({
            level: 'warn',
            message: 'Non-monotonic sample timestamp (1 -> 0.5); using dt=0'
        });
    });

    it('reports accelerometer tilt without touching the filter state', () => {
        const engine = createEngine({ algorithm: 'accelerometer_only' });
        const result = engine.processSample(sampleAt(0, { x: 3, y: 0, z: 0 }, { x: 0, y: -0.5, z: -Math.sqrt(3) / 2 }));

        expect(result.estimate.pitch).toBeCloseTo(Math.PI / 6, 12);
        expect(engine.getState()).toEqual({ currentOrientation: IDENTITY, gyroPitch: 0, gyroRoll: 0 });
    });

    it('counts rejected corrections under linear acceleration', () => {
        const engine = createEngine();
        const result = engine.processSample(sampleAt(0, STILL, { x: 0, y: 0, z: -1.5 }));
        engine.processSample(sampleAt(0.02));

        expect(result.steps).toEqual({ propagation: 'skipped_negligible_rate', correction: 'skipped_linear_acceleration' });
        expect(engine.getStats()).toMatchObject({ processedTicks: 2, correctionsApplied: 0, correctionsRejected: 1 });
    });
});

describe('tilt engine algorithm switching', () => {
    beforeEach(() => {
        debugLog.setEcho(false);
        debugLog.clear();
    });

    it('resets the state whenever an algorithm is selected', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only', startTimestamp: 0 });
        engine.processSample(sampleAt(1, { x: 0.3, y: -0.2, z: 0 }));
        expect(engine.getState().gyroPitch).toBeCloseTo(0.3, 12);

        engine.switchAlgorithm('gyroscope_only');
        expect(engine.getState()).toEqual({ currentOrientation: IDENTITY, gyroPitch: 0, gyroRoll: 0 });
        expect(engine.getAlgorithm()).toBe('gyroscope_only');
    });

    it('clears integrated angles across a switch away and back', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only', startTimestamp: 0 });
        engine.processSample(sampleAt(1, { x: 0.3, y: 0, z: 0 }));

        engine.switchAlgorithm('complementary_filter');
        engine.switchAlgorithm('gyroscope_only');

        expect(engine.getState().gyroPitch).toBe(0);
        expect(engine.processSample(sampleAt(1.5)).estimate.pitch).toBe(0);
    });

    it('starts the complementary filter from identity after a switch', () => {
        const engine = createEngine({ startTimestamp: 0 });
        engine.processSample(sampleAt(0.5, { x: 0.4, y: 0, z: 0 }, STILL));
        expect(engine.getState().currentOrientation).not.toEqual(IDENTITY);

        engine.switchAlgorithm('accelerometer_only');
        engine.switchAlgorithm('complementary_filter');

        expect(engine.getState().currentOrientation).toEqual(IDENTITY);
        expect(debugLog.getLogs().map(entry => entry.message)).toEqual([
            'Algorithm switched: accelerometer_only -> complementary_filter (state reset)',
            'Algorithm switched: complementary_filter -> accelerometer_only (state reset)'
        ]);
    });

    it('tags records with the algorithm active when they were taken', () => {
        const engine = createEngine({ startTimestamp: 0 });
        engine.startRecording();
        engine.processSample(sampleAt(0.02));
        engine.switchAlgorithm('accelerometer_only');
        engine.processSample(sampleAt(0.04));

        expect(engine.stopRecording().map(record => record.algorithm)).toEqual(['complementary_filter', 'accelerometer_only']);
    });
});

describe('tilt engine recording', () => {
    beforeEach(() => {
        debugLog.setEcho(false);
    });

    it('captures one record per processed sample while recording', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only', startTimestamp: 0 });
        engine.processSample(sampleAt(0.02));
        expect(engine.isRecording()).toBe(false);

        engine.startRecording();
        engine.processSample(sampleAt(0.04, { x: 0.5, y: 0, z: 0 }, { x: 0.01, y: 0.02, z: -0.98 }));
        engine.processSample(sampleAt(0.06));
        expect(engine.isRecording()).toBe(true);
        expect(engine.getStats().recordsCaptured).toBe(2);

        const records = engine.stopRecording();
        expect(engine.isRecording()).toBe(false);
        expect(records).toHaveLength(2);
        expect(records[0]).toEqual({
            timestamp: 0.04,
            accelerometer: { x: 0.01, y: 0.02, z: -0.98 },
            gyroscope: { x: 0.5, y: 0, z: 0 },
            orientation: { pitch: records[0].orientation.pitch, roll: 0 },
            algorithm: 'gyroscope_only'
        });
        expect(records[0].orientation.pitch).toBeCloseTo(0.01, 12);

        engine.processSample(sampleAt(0.08));
        expect(engine.getRecords()).toHaveLength(2);
    });

    it('clears previous records when recording restarts', () => {
        const engine = createEngine();
        engine.startRecording();
        engine.processSample(sampleAt(0));
        engine.stopRecording();

        engine.startRecording();
        expect(engine.getRecords()).toEqual([]);
    });

    it('copies sensor vectors into the record', () => {
        const engine = createEngine();
        const accelerometer = { x: 0, y: 0, z: -1 };
        engine.startRecording();
        engine.processSample(sampleAt(0, STILL, accelerometer));
        accelerometer.z = 5;

        expect(engine.getRecords()[0].accelerometer.z).toBe(-1);
    });

    it('keeps the recording log apart from returned records', () => {
        const engine = createEngine({ algorithm: 'gyroscope_only' });
        engine.startRecording();
        const result = engine.processSample(sampleAt(0));

        result.record.orientation.pitch = 99;
        result.record.algorithm = 'accelerometer_only';
        engine.getRecords()[0].accelerometer.x = 7;

        const records = engine.stopRecording();
        records[0].timestamp = 123;

        expect(engine.getRecords()).toEqual([{
            timestamp: 0,
            accelerometer: { x: 0, y: 0, z: -1 },
            gyroscope: { x: 0, y: 0, z: 0 },
            orientation: { pitch: 0, roll: 0 },
            algorithm: 'gyroscope_only'
        }]);
    });
});

describe('tilt engine tick', () => {
    beforeEach(() => {
        debugLog.setEcho(false);
    });

    it('skips without reading the clock when the sensor is unavailable', () => {
        const engine = createEngine();
        const provider: SensorProvider = { read: () => null };
        const now = vi.fn(() => 1);

        const outcome = engine.tick(provider, { now });

        expect(outcome).toEqual({ status: 'skipped', reason: 'sensor_unavailable' });
        expect(now).not.toHaveBeenCalled();
        expect(engine.getStats()).toMatchObject({ processedTicks: 0, skippedTicks: 1 });
    });

    it('stamps readings with the clock', () => {
        const engine = createEngine({ algorithm: 'accelerometer_only' });
        const reading: SensorReading = { accelerometer: { x: 0.5, y: 0, z: -Math.sqrt(3) / 2 }, gyroscope: STILL };
        const clock: Clock = { now: () => 42 };
        engine.startRecording();

        const outcome = engine.tick({ read: () => reading }, clock);

        expect(outcome.status).toBe('processed');
        if (outcome.status !== 'processed') return;
        expect(outcome.record.timestamp).toBe(42);
        expect(outcome.estimate.roll).toBeCloseTo(Math.PI / 6, 12);
        expect(engine.getRecords()).toHaveLength(1);
    });
});

describe('tilt engine options', () => {
    it('applies defaults', () => {
        const engine = createEngine();
        expect(engine.getAlgorithm()).toBe('complementary_filter');
        expect(engine.getParams()).toEqual({
            alpha: 0.02,
            thresholds: {
                gyroRateEpsilon: 0.001,
                gravityMagnitude: 1,
                gravityTolerance: 0.1,
                tiltAxisEpsilon: 0.001,
                accelMinMagnitude: 0.1
            }
        });
    });

    it('merges partial thresholds over the defaults', () => {
        const engine = createEngine({ alpha: 0.5, thresholds: { gravityTolerance: 0.6 } });
        const params = engine.getParams();
        expect(params.alpha).toBe(0.5);
        expect(params.thresholds.gravityTolerance).toBe(0.6);
        expect(params.thresholds.gyroRateEpsilon).toBe(0.001);

        const result = engine.processSample(sampleAt(0, STILL, { x: 0, y: 0, z: -1.5 }));
        expect(result.steps?.correction).toBe('skipped_aligned');
    });

    it('returns a copy of the parameters', () => {
        const engine = createEngine();
        engine.getParams().thresholds.gravityTolerance = 5;
        expect(engine.getParams().thresholds.gravityTolerance).toBe(0.1);
    });

    it('rejects an out-of-range gain', () => {
        expect(() => createEngine({ alpha: 0 })).toThrow('Invalid engine options: alpha: Number must be greater than 0');
        expect(() => createEngine({ alpha: 1.5 })).toThrow(/^Invalid engine options: alpha:/);
    });

    it('lists every failing field', () => {
        expect(() => createEngine({ alpha: -1, thresholds: { gravityMagnitude: 0 } })).toThrow(
            'Invalid engine options: alpha: Number must be greater than 0; thresholds.gravityMagnitude: Number must be greater than 0'
        );
    });
});

describe('tilt engine reset', () => {
    it('returns to a freshly constructed state', () => {
        debugLog.setEcho(false);
        const engine = createEngine({ algorithm: 'gyroscope_only', startTimestamp: 10 });
        engine.startRecording();
        engine.processSample(sampleAt(11, { x: 0.2, y: 0, z: 0 }));
        engine.tick({ read: () => null }, { now: () => 0 });

        engine.reset();

        expect(engine.isRecording()).toBe(false);
        expect(engine.getRecords()).toEqual([]);
        expect(engine.getState().gyroPitch).toBe(0);
        expect(engine.getStats()).toEqual({
            processedTicks: 0,
            skippedTicks: 0,
            correctionsApplied: 0,
            correctionsRejected: 0,
            recordsCaptured: 0,
            cadence: { samplesCount: 0, observedHz: 0, dtMsMedian: null, dtMsP95: null }
        });
        expect(engine.processSample(sampleAt(12)).dt).toBe(2);
    });
});
