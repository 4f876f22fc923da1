/**
 * Noise and bias characterization of a recorded session.
 */

import { getMean, getStdDev } from '../core/stats';
import { vectorMagnitude } from '../utils/motionMath';
import type { SensorRecord, Vector3 } from '../core/types';
import type { AxisStats, ImuAnalysisResult } from '../types';

const meanVector = (vectors: Vector3[]): Vector3 => ({
    x: getMean(vectors.map(v => v.x)),
    y: getMean(vectors.map(v => v.y)),
    z: getMean(vectors.map(v => v.z))
});

const axisStats = (vectors: Vector3[], biasVectors: Vector3[] = vectors): AxisStats => {
    const bias = meanVector(biasVectors);
    return {
        noise: getStdDev(vectors.map(vectorMagnitude)),
        bias,
        biasLength: vectorMagnitude(bias)
    };
};

/**
 * Accelerometer bias is taken after adding 1g back to z, assuming the
 * device rests face up (z ≈ -1g). Noise uses the raw vector lengths.
 */
export const analyzeRecording = (records: SensorRecord[]): ImuAnalysisResult => {
    const accel = records.map(r => r.accelerometer);
    const gravityAdjusted = accel.map(a => ({ x: a.x, y: a.y, z: a.z + 1.0 }));
    const gyro = records.map(r => r.gyroscope);
    const t0 = records.length > 0 ? records[0].timestamp : 0;

    return {
        sampleCount: records.length,
        accelerometer: axisStats(accel, gravityAdjusted),
        gyroscope: axisStats(gyro),
        series: {
            t: records.map(r => r.timestamp - t0),
            pitch: records.map(r => r.orientation.pitch),
            roll: records.map(r => r.orientation.roll)
        }
    };
};

const formatAxis = (label: string, stats: AxisStats, biasNote: string): string[] => [
    `${label}:`,
    `  Noise (std of vector lengths): ${stats.noise.toFixed(6)}`,
    `  Bias (average of vectors${biasNote}): [${stats.bias.x.toFixed(6)}, ${stats.bias.y.toFixed(6)}, ${stats.bias.z.toFixed(6)}]`,
    `  Bias vector length: ${stats.biasLength.toFixed(6)}`
];

export const formatAnalysisReport = (result: ImuAnalysisResult): string => {
    return [
        '--- IMU Analysis Results ---',
        `Samples: ${result.sampleCount}`,
        ...formatAxis('Accelerometer', result.accelerometer, ', gravity adjusted'),
        ...formatAxis('Gyroscope', result.gyroscope, '')
    ].join('\n');
};
