import type { Vector3 } from '../core/types';

const TWO_PI = 2 * Math.PI;

export const vectorMagnitude = (v: Vector3): number => {
    return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
};

export const scaleVector = (v: Vector3, factor: number): Vector3 => {
    return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
};

export const dot = (a: Vector3, b: Vector3): number => {
    return a.x * b.x + a.y * b.y + a.z * b.z;
};

export const clamp = (value: number, min: number, max: number): number => {
    return Math.max(min, Math.min(max, value));
};

/**
 * Single-step wrap into [-π, π].
 * Only corrects one revolution; per-tick increments are far below 2π.
 */
export const wrapAngle = (angle: number): number => {
    if (angle > Math.PI) return angle - TWO_PI;
    if (angle < -Math.PI) return angle + TWO_PI;
    return angle;
};

export const toDegrees = (rad: number): number => (rad * 180) / Math.PI;
