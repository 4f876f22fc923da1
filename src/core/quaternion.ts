import type { Quaternion, Vector3 } from './types';

export const IDENTITY: Quaternion = Object.freeze({ w: 1, x: 0, y: 0, z: 0 });

export const quaternionNorm = (q: Quaternion): number => {
    return Math.sqrt(q.w * q.w + q.x * q.x + q.y * q.y + q.z * q.z);
};

/**
 * Hamilton product a ⊗ b. Not commutative: `multiply(current, delta)` applies
 * `delta` in the body frame, `multiply(delta, current)` in the global frame.
 */
export const multiply = (a: Quaternion, b: Quaternion): Quaternion => ({
    w: a.w * b.w - a.x * b.x - a.y * b.y - a.z * b.z,
    x: a.w * b.x + a.x * b.w + a.y * b.z - a.z * b.y,
    y: a.w * b.y - a.x * b.z + a.y * b.w + a.z * b.x,
    z: a.w * b.z + a.x * b.y - a.y * b.x + a.z * b.w
});

/** Equals the inverse for unit quaternions. */
export const conjugate = (q: Quaternion): Quaternion => ({
    w: q.w,
    x: -q.x,
    y: -q.y,
    z: -q.z
});

/**
 * Scales q to unit norm. A zero-norm input yields the identity.
 */
export const normalize = (q: Quaternion): Quaternion => {
    const magnitude = quaternionNorm(q);
    if (!(magnitude > 0)) {
        return IDENTITY;
    }
    return {
        w: q.w / magnitude,
        x: q.x / magnitude,
        y: q.y / magnitude,
        z: q.z / magnitude
    };
};

/**
 * Rotation of `angle` radians about `axis`. The axis is used as given
 * (callers pass unit axes) and the result is re-normalized.
 */
export const fromAxisAngle = (axis: Vector3, angle: number): Quaternion => {
    const halfAngle = angle / 2;
    const sinHalf = Math.sin(halfAngle);
    return normalize({
        w: Math.cos(halfAngle),
        x: axis.x * sinHalf,
        y: axis.y * sinHalf,
        z: axis.z * sinHalf
    });
};

/** q ⊗ (0, v) ⊗ q* */
export const rotate = (q: Quaternion, v: Vector3): Vector3 => {
    const pure: Quaternion = { w: 0, x: v.x, y: v.y, z: v.z };
    const result = multiply(multiply(q, pure), conjugate(q));
    return { x: result.x, y: result.y, z: result.z };
};
