import * as fflate from 'fflate';
import { TILT_CONFIG } from '../core/tiltConfig';
import { copySensorRecord } from '../core';
import type { SensorRecord } from '../core/types';
import type { RecordChunk, RecordingMetadata } from '../types';

export const ARCHIVE_METADATA_FILE = 'metadata.json';
export const ARCHIVE_SAMPLES_FILE = 'samples.ndjson';

/**
 * Wire form of one record with a fixed key order.
 */
export const toWireRecord = copySensorRecord;

/**
 * Splits records into NDJSON chunks. Every chunk ends with a newline so
 * chunks concatenate into a valid NDJSON document.
 */
export const chunkRecords = (
    records: SensorRecord[],
    chunkSize: number = TILT_CONFIG.export.chunkSize
): RecordChunk[] => {
    const size = Math.max(1, Math.floor(chunkSize));
    const chunks: RecordChunk[] = [];

    for (let i = 0; i < records.length; i += size) {
        const slice = records.slice(i, i + size);
        const data = slice.map(r => JSON.stringify(toWireRecord(r))).join('\n') + '\n';
        chunks.push({
            chunkIndex: Math.floor(i / size),
            recordCount: slice.length,
            byteLength: Buffer.byteLength(data, 'utf8'),
            format: 'ndjson',
            data
        });
    }

    return chunks;
};

export const assembleNdjson = (chunks: RecordChunk[]): string => {
    return [...chunks]
        .sort((a, b) => a.chunkIndex - b.chunkIndex)
        .map(c => c.data.endsWith('\n') ? c.data : c.data + '\n')
        .join('');
};

export const parseNdjson = (ndjson: string): unknown[] => {
    return ndjson
        .split('\n')
        .filter(line => line.trim().length > 0)
        .map(line => JSON.parse(line));
};

/**
 * Zips metadata.json and samples.ndjson into one archive.
 */
export const buildRecordingArchive = (
    samplesNdjson: string,
    metadata: RecordingMetadata
): Promise<Uint8Array> => {
    const zipData: fflate.Zippable = {
        [ARCHIVE_METADATA_FILE]: fflate.strToU8(JSON.stringify(metadata, null, 2)),
        [ARCHIVE_SAMPLES_FILE]: fflate.strToU8(samplesNdjson)
    };

    return new Promise<Uint8Array>((resolve, reject) => {
        fflate.zip(zipData, { level: TILT_CONFIG.export.zipLevel }, (err, data) => {
            if (err) {
                reject(new Error('Zip compression failed: ' + err.message));
                return;
            }
            resolve(data);
        });
    });
};

export interface ArchiveContents {
    metadata: unknown;
    records: unknown[];
}

/**
 * Unpacks an archive written by buildRecordingArchive. Shape validation
 * of the contents is left to the caller.
 */
export const readRecordingArchive = (bytes: Uint8Array): ArchiveContents => {
    const files = fflate.unzipSync(bytes);
    const samples = files[ARCHIVE_SAMPLES_FILE];
    if (!samples) {
        throw new Error(`Archive is missing ${ARCHIVE_SAMPLES_FILE}`);
    }
    const meta = files[ARCHIVE_METADATA_FILE];

    return {
        metadata: meta ? JSON.parse(fflate.strFromU8(meta)) : null,
        records: parseNdjson(fflate.strFromU8(samples))
    };
};
