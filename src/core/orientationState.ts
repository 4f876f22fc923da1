import { IDENTITY } from './quaternion';
import type { OrientationState, TiltAlgorithm } from './types';

export const createOrientationState = (): OrientationState => ({
    currentOrientation: IDENTITY,
    gyroPitch: 0,
    gyroRoll: 0
});

export const resetOrientationState = (state: OrientationState): void => {
    state.currentOrientation = IDENTITY;
    state.gyroPitch = 0;
    state.gyroRoll = 0;
};

export const snapshotOrientationState = (state: OrientationState): Readonly<OrientationState> => {
    return Object.freeze({ ...state });
};

export interface AlgorithmSelection {
    algorithm: TiltAlgorithm;
    state: OrientationState;
}

/**
 * Selecting an algorithm always starts it from a clean state: identity
 * orientation and zeroed gyro angles, even when re-selecting the active one.
 */
export const switchAlgorithm = (selection: AlgorithmSelection, next: TiltAlgorithm): AlgorithmSelection => {
    resetOrientationState(selection.state);
    selection.algorithm = next;
    return selection;
};
