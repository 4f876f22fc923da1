export const TILT_CONFIG = {
    complementary: {
        alpha: 0.02,
        gyroRateEpsilon: 0.001,
        gravityMagnitude: 1.0,
        gravityTolerance: 0.1,
        tiltAxisEpsilon: 0.001
    },
    accelerometer: {
        minMagnitude: 0.1
    },
    sampling: {
        rateHz: 50,
        rateToleranceRatio: 0.2,
        healthWindowSize: 1000
    },
    export: {
        filePrefix: 'sensor_data',
        chunkSize: 120,
        zipLevel: 9
    },
    defaultAlgorithm: 'complementary_filter'
} as const;
