/**
 * Recording consistency checks.
 * Runs on records that already passed the wire schema and reports
 * problems the schema cannot see.
 */

import { TILT_CONFIG } from '../core/tiltConfig';
import { computeIntervalStats, getMean } from '../core/stats';
import { vectorMagnitude } from '../utils/motionMath';
import type { SensorRecord } from '../core/types';
import type { ValidationResult } from '../types';

const RULES_VERSION = "1.0";
const ANGLE_EPS = 1e-9;
const GRAVITY_MEAN_TOLERANCE = 0.2;

export function validateRecording(records: SensorRecord[], now: Date = new Date()): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // A. Value sanity
    validateFiniteValues(records, errors);

    // B. Time ordering and rate
    validateTimeline(records, errors, warnings);

    // C. Angle ranges
    validateAngleRanges(records, warnings);

    // D. Session consistency
    validateSessionConsistency(records, warnings);

    let status: ValidationResult['status'] = "pass";
    if (errors.length > 0) {
        status = "fail";
    } else if (warnings.length > 0) {
        status = "warn";
    }

    return {
        status,
        errors,
        warnings,
        checkedAtIso: now.toISOString(),
        rulesVersion: RULES_VERSION
    };
}

const numericFields = (r: SensorRecord): Array<[string, number]> => [
    ['timestamp', r.timestamp],
    ['accelerometer.x', r.accelerometer.x],
    ['accelerometer.y', r.accelerometer.y],
    ['accelerometer.z', r.accelerometer.z],
    ['gyroscope.x', r.gyroscope.x],
    ['gyroscope.y', r.gyroscope.y],
    ['gyroscope.z', r.gyroscope.z],
    ['orientation.pitch', r.orientation.pitch],
    ['orientation.roll', r.orientation.roll]
];

/**
 * One message per non-finite numeric field. JSON has no encoding for
 * NaN or ±Infinity, so records carrying them cannot round-trip.
 */
export function findNonFiniteValues(records: SensorRecord[]): string[] {
    const problems: string[] = [];
    records.forEach((record, index) => {
        for (const [field, value] of numericFields(record)) {
            if (!Number.isFinite(value)) {
                problems.push(`Non-finite value at record ${index}: ${field}=${value}`);
            }
        }
    });
    return problems;
}

function validateFiniteValues(records: SensorRecord[], errors: string[]) {
    errors.push(...findNonFiniteValues(records));
}

function validateTimeline(records: SensorRecord[], errors: string[], warnings: string[]) {
    let duplicates = 0;
    for (let i = 1; i < records.length; i++) {
        const dt = records[i].timestamp - records[i - 1].timestamp;
        if (dt < 0) {
            errors.push(`Timestamp decreases at record ${i}: ${records[i - 1].timestamp} -> ${records[i].timestamp}`);
        } else if (dt === 0) {
            duplicates++;
        }
    }
    if (duplicates > 0) {
        warnings.push(`Duplicate timestamps: ${duplicates}`);
    }

    if (records.length >= 3) {
        const { observedHz } = computeIntervalStats(records.map(r => r.timestamp));
        const expected = TILT_CONFIG.sampling.rateHz;
        const tolerance = expected * TILT_CONFIG.sampling.rateToleranceRatio;
        if (Math.abs(observedHz - expected) > tolerance) {
            warnings.push(`Sample rate mismatch: observed ${observedHz}Hz, expected ${expected}Hz ±20%`);
        }
    }
}

function validateAngleRanges(records: SensorRecord[], warnings: string[]) {
    const pitchOut = records.filter(r => Math.abs(r.orientation.pitch) > Math.PI / 2 + ANGLE_EPS).length;
    const rollOut = records.filter(r => Math.abs(r.orientation.roll) > Math.PI + ANGLE_EPS).length;
    if (pitchOut > 0) {
        warnings.push(`Pitch outside [-π/2, π/2] in ${pitchOut} records`);
    }
    if (rollOut > 0) {
        warnings.push(`Roll outside [-π, π] in ${rollOut} records`);
    }
}

function validateSessionConsistency(records: SensorRecord[], warnings: string[]) {
    const algorithms = [...new Set(records.map(r => r.algorithm))];
    if (algorithms.length > 1) {
        warnings.push(`Mixed algorithms in one recording: ${algorithms.join(', ')}`);
    }

    if (records.length > 0) {
        const meanMagnitude = getMean(records.map(r => vectorMagnitude(r.accelerometer)));
        if (Math.abs(meanMagnitude - 1) > GRAVITY_MEAN_TOLERANCE) {
            warnings.push(`Mean accelerometer magnitude ${meanMagnitude.toFixed(3)}g is far from 1g`);
        }
    }
}
