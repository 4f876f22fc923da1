import { link, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { TILT_CONFIG } from '../core/tiltConfig';
import { debugLog } from './debugLog';
import { addExportMetadata, buildRecordingMetadata } from './metadata';
import { validateRecordingSchema } from './recordSchema';
import { findNonFiniteValues } from './recordingValidator';
import {
    ARCHIVE_SAMPLES_FILE,
    assembleNdjson,
    buildRecordingArchive,
    chunkRecords,
    readRecordingArchive,
    toWireRecord
} from './archive';
import type { SensorRecord, TiltAlgorithm } from '../core/types';
import type { ExportFormat, ExportOptions, ExportResult, LoadResult } from '../types';

export const NO_DATA_MESSAGE = 'No sensor data collected.';

const MAX_REPORTED_PROBLEMS = 3;

const pad = (value: number, width: number = 2) => String(value).padStart(width, '0');

/**
 * yyyyMMdd_HHmmss in local time
 */
export const formatFileTimestamp = (date: Date): string => {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
        `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
};

export const buildExportFilename = (
    algorithm: TiltAlgorithm,
    date: Date,
    format: ExportFormat = 'json'
): string => {
    return `${TILT_CONFIG.export.filePrefix}_${formatFileTimestamp(date)}_${algorithm}.${format}`;
};

export const serializeRecording = (records: SensorRecord[]): string => {
    return JSON.stringify(records.map(toWireRecord), null, 2);
};

let tempCounter = 0;

const hasErrorCode = (error: unknown, code: string): boolean => {
    return error instanceof Error && 'code' in error && error.code === code;
};

/**
 * Write the payload to a temp file private to this call, then hard-link it
 * under the first free name: the base name, then _1, _2, ...
 * `link` fails with EEXIST rather than replace an existing file.
 */
const writeUnique = async (
    directory: string,
    filename: string,
    payload: string | Uint8Array
): Promise<string> => {
    const ext = path.extname(filename);
    const stem = filename.slice(0, filename.length - ext.length);
    const tempPath = path.join(directory, `.${stem}.${process.pid}.${++tempCounter}.tmp`);

    try {
        await writeFile(tempPath, payload);
        for (let n = 0; ; n++) {
            const candidate = path.join(directory, n === 0 ? filename : `${stem}_${n}${ext}`);
            try {
                await link(tempPath, candidate);
                return candidate;
            } catch (error) {
                if (!hasErrorCode(error, 'EEXIST')) throw error;
            }
        }
    } finally {
        await rm(tempPath, { force: true });
    }
};

const buildPayload = async (
    records: SensorRecord[],
    options: ExportOptions,
    filename: string,
    now: Date
): Promise<string | Uint8Array> => {
    if ((options.format ?? 'json') === 'json') {
        return serializeRecording(records);
    }

    const ndjson = assembleNdjson(chunkRecords(records));
    const metadata = addExportMetadata(
        buildRecordingMetadata(records, {
            algorithm: options.algorithm,
            alpha: options.alpha,
            thresholds: options.thresholds,
            now
        }),
        ARCHIVE_SAMPLES_FILE,
        ndjson,
        'zip',
        now
    );
    debugLog.log(`Archive ${filename}: validation ${metadata.validation.status}`);
    return buildRecordingArchive(ndjson, metadata);
};

/**
 * Persist a finished recording. Empty recordings are refused with a
 * notice instead of writing an empty file, and records holding NaN or
 * ±Infinity are refused since JSON cannot carry them. Failures come back
 * as results.
 */
export const exportRecording = async (
    records: SensorRecord[],
    options: ExportOptions
): Promise<ExportResult> => {
    if (records.length === 0) {
        debugLog.warn('Export skipped: no data');
        return { status: 'no_data', message: NO_DATA_MESSAGE };
    }

    const nonFinite = findNonFiniteValues(records);
    if (nonFinite.length > 0) {
        const hidden = nonFinite.length - MAX_REPORTED_PROBLEMS;
        const message = `Failed to save data: ${nonFinite.slice(0, MAX_REPORTED_PROBLEMS).join('; ')}` +
            (hidden > 0 ? ` (+${hidden} more)` : '');
        debugLog.error(message);
        return { status: 'error', message };
    }

    const now = options.now ?? new Date();
    const format = options.format ?? 'json';

    try {
        await mkdir(options.directory, { recursive: true });
        const baseName = buildExportFilename(options.algorithm, now, format);
        const payload = await buildPayload(records, options, baseName, now);

        const target = await writeUnique(options.directory, baseName, payload);
        const filename = path.basename(target);

        const bytes = typeof payload === 'string' ? Buffer.byteLength(payload, 'utf8') : payload.byteLength;
        debugLog.log(`Data saved to: ${target} (${records.length} records)`);
        return { status: 'saved', path: target, filename, recordCount: records.length, bytes };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        debugLog.error(`Failed to save data: ${message}`);
        return { status: 'error', message: `Failed to save data: ${message}` };
    }
};

/**
 * Read a .json export or a .zip archive and validate it against the wire schema.
 */
export const loadRecording = async (filePath: string): Promise<LoadResult> => {
    try {
        const bytes = await readFile(filePath);
        const data: unknown = path.extname(filePath).toLowerCase() === '.zip'
            ? readRecordingArchive(bytes).records
            : JSON.parse(bytes.toString('utf8'));
        return validateRecordingSchema(data);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        debugLog.error(`Failed to load ${filePath}: ${message}`);
        return { success: false, errors: [message] };
    }
};
