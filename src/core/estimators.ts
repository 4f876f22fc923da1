import { TILT_CONFIG } from './tiltConfig';
import { fromAxisAngle, multiply, normalize, rotate } from './quaternion';
import { clamp, dot, scaleVector, vectorMagnitude, wrapAngle } from '../utils/motionMath';
import type {
    ComplementarySteps,
    CorrectionOutcome,
    FilterParams,
    FilterThresholds,
    OrientationState,
    PropagationOutcome,
    Quaternion,
    SensorSample,
    Seconds,
    TiltAlgorithm,
    TiltAngles,
    Vector3
} from './types';

export const DEFAULT_THRESHOLDS: FilterThresholds = {
    gyroRateEpsilon: TILT_CONFIG.complementary.gyroRateEpsilon,
    gravityMagnitude: TILT_CONFIG.complementary.gravityMagnitude,
    gravityTolerance: TILT_CONFIG.complementary.gravityTolerance,
    tiltAxisEpsilon: TILT_CONFIG.complementary.tiltAxisEpsilon,
    accelMinMagnitude: TILT_CONFIG.accelerometer.minMagnitude
};

export const DEFAULT_FILTER_PARAMS: FilterParams = {
    alpha: TILT_CONFIG.complementary.alpha,
    thresholds: DEFAULT_THRESHOLDS
};

const UP_VECTOR: Vector3 = { x: 0, y: 0, z: -1 };
const FORWARD_VECTOR: Vector3 = { x: 0, y: 0, z: 1 };

// ===== Accelerometer only =====

/**
 * Tilt from the gravity direction alone. Stateless and drift-free, but any
 * linear acceleration shows up directly as tilt error.
 */
export const estimateAccelerometerTilt = (
    accel: Vector3,
    thresholds: FilterThresholds = DEFAULT_THRESHOLDS
): TiltAngles => {
    const magnitude = vectorMagnitude(accel);
    if (!Number.isFinite(magnitude) || magnitude < thresholds.accelMinMagnitude) {
        return { pitch: 0, roll: 0 };
    }

    const a = scaleVector(accel, 1 / magnitude);
    return {
        pitch: Math.asin(clamp(-a.y, -1, 1)),
        roll: Math.atan2(a.x, -a.z)
    };
};

// ===== Gyroscope only =====

/**
 * Euler-integrates body rates into the state's gyro angles.
 * Sensor bias accumulates without bound.
 */
export const integrateGyroscopeTilt = (
    state: OrientationState,
    gyro: Vector3,
    dt: Seconds
): TiltAngles => {
    const dPitch = gyro.x * dt;
    const dRoll = gyro.y * dt;
    // A non-finite reading leaves the integrated angles untouched.
    if (Number.isFinite(dPitch) && Number.isFinite(dRoll)) {
        state.gyroPitch = wrapAngle(state.gyroPitch + dPitch);
        state.gyroRoll = wrapAngle(state.gyroRoll + dRoll);
    }
    return { pitch: state.gyroPitch, roll: state.gyroRoll };
};

// ===== Complementary filter =====

/**
 * Step 1: dead-reckon the orientation by the body-frame rotation over dt.
 */
export const propagateGyroscope = (
    state: OrientationState,
    gyro: Vector3,
    dt: Seconds,
    thresholds: FilterThresholds = DEFAULT_THRESHOLDS
): PropagationOutcome => {
    const rate = vectorMagnitude(gyro);
    if (!Number.isFinite(rate) || !Number.isFinite(dt) || rate < thresholds.gyroRateEpsilon) {
        return 'skipped_negligible_rate';
    }

    const axis = scaleVector(gyro, 1 / rate);
    const delta = fromAxisAngle(axis, rate * dt);
    state.currentOrientation = normalize(multiply(state.currentOrientation, delta));
    return 'applied';
};

/**
 * Step 2: pull the estimated "down" toward the measured gravity direction
 * by a fraction alpha of the tilt error, composed in the global frame.
 */
export const correctWithAccelerometer = (
    state: OrientationState,
    accel: Vector3,
    params: FilterParams = DEFAULT_FILTER_PARAMS
): CorrectionOutcome => {
    const { alpha, thresholds } = params;
    const magnitude = vectorMagnitude(accel);
    if (!Number.isFinite(magnitude) || Math.abs(magnitude - thresholds.gravityMagnitude) > thresholds.gravityTolerance) {
        return 'skipped_linear_acceleration';
    }

    const globalAccel = rotate(state.currentOrientation, scaleVector(accel, 1 / magnitude));

    const tiltAxis: Vector3 = { x: globalAccel.y, y: -globalAccel.x, z: 0 };
    const axisMagnitude = vectorMagnitude(tiltAxis);
    if (axisMagnitude < thresholds.tiltAxisEpsilon) {
        return 'skipped_aligned';
    }

    const tiltError = Math.acos(clamp(dot(globalAccel, UP_VECTOR), -1, 1));
    const correction = fromAxisAngle(scaleVector(tiltAxis, 1 / axisMagnitude), -alpha * tiltError);
    state.currentOrientation = normalize(multiply(correction, state.currentOrientation));
    return 'applied';
};

/**
 * Step 3: read pitch/roll off the direction the body z-axis points to.
 */
export const extractPitchAndRoll = (orientation: Quaternion): TiltAngles => {
    const forward = rotate(orientation, FORWARD_VECTOR);
    return {
        pitch: Math.asin(clamp(-forward.y, -1, 1)),
        roll: Math.atan2(forward.x, forward.z)
    };
};

export interface ComplementaryResult extends TiltAngles {
    steps: ComplementarySteps;
}

export const estimateComplementaryTilt = (
    state: OrientationState,
    sample: Pick<SensorSample, 'accelerometer' | 'gyroscope'>,
    dt: Seconds,
    params: FilterParams = DEFAULT_FILTER_PARAMS
): ComplementaryResult => {
    const propagation = propagateGyroscope(state, sample.gyroscope, dt, params.thresholds);
    const correction = correctWithAccelerometer(state, sample.accelerometer, params);
    return {
        ...extractPitchAndRoll(state.currentOrientation),
        steps: { propagation, correction }
    };
};

// ===== Dispatch =====

export interface EstimatorOutput extends TiltAngles {
    steps?: ComplementarySteps;
}

export const runEstimator = (
    algorithm: TiltAlgorithm,
    state: OrientationState,
    sample: SensorSample,
    dt: Seconds,
    params: FilterParams = DEFAULT_FILTER_PARAMS
): EstimatorOutput => {
    switch (algorithm) {
        case 'accelerometer_only':
            return estimateAccelerometerTilt(sample.accelerometer, params.thresholds);
        case 'gyroscope_only':
            return integrateGyroscopeTilt(state, sample.gyroscope, dt);
        case 'complementary_filter':
            return estimateComplementaryTilt(state, sample, dt, params);
        default: {
            const unhandled: never = algorithm;
            return unhandled;
        }
    }
};
