export { copySensorRecord, createEngine } from './core';
export type { TiltEngine } from './core';
export * from './core/types';
export { TILT_CONFIG } from './core/tiltConfig';
export {
    IDENTITY,
    conjugate,
    fromAxisAngle,
    multiply,
    normalize,
    quaternionNorm,
    rotate
} from './core/quaternion';
export {
    createOrientationState,
    resetOrientationState,
    switchAlgorithm
} from './core/orientationState';
export {
    DEFAULT_FILTER_PARAMS,
    DEFAULT_THRESHOLDS,
    correctWithAccelerometer,
    estimateAccelerometerTilt,
    estimateComplementaryTilt,
    extractPitchAndRoll,
    integrateGyroscopeTilt,
    propagateGyroscope,
    runEstimator
} from './core/estimators';
export { EngineOptionsSchema, TiltAlgorithmSchema, resolveEngineOptions } from './core/engineOptions';
export { createReplaySource, replayRecording } from './core/replay';
export type { ReplaySource } from './core/replay';
export { toDegrees, wrapAngle } from './utils/motionMath';

export { SamplingHealthMonitor } from './sensors/samplingStats';
export { monotonicClock, startTicker } from './sensors/sensorCollector';
export type { Ticker, TickerOptions } from './sensors/sensorCollector';
export type { Clock, SensorProvider, SensorReading, TickHealth } from './sensors/sensorTypes';

export { debugLog } from './lib/debugLog';
export type { LogEntry, LogLevel } from './lib/debugLog';
export { RecordingSchema, SensorRecordSchema, validateRecordingSchema } from './lib/recordSchema';
export { validateRecording } from './lib/recordingValidator';
export { buildRecordingMetadata } from './lib/metadata';
export { buildRecordingArchive, chunkRecords, readRecordingArchive } from './lib/archive';
export { buildExportFilename, exportRecording, loadRecording, serializeRecording } from './lib/storage';
export { analyzeRecording, formatAnalysisReport } from './lib/imuAnalysis';
export type {
    ExportFormat,
    ExportOptions,
    ExportResult,
    ImuAnalysisResult,
    LoadResult,
    RecordingMetadata,
    ValidationResult
} from './types';
