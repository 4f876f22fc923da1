import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { debugLog } from './debugLog';
import type { LogEntry } from './debugLog';

describe('debugLog', () => {
    beforeEach(() => {
        debugLog.setEcho(false);
        debugLog.clear();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('keeps entries newest first', () => {
        debugLog.log('first');
        debugLog.warn('second');
        debugLog.error('third');

        expect(debugLog.getLogs().map(e => [e.level, e.message])).toEqual([
            ['error', 'third'],
            ['warn', 'second'],
            ['info', 'first']
        ]);
    });

    it('drops the oldest entries past 100', () => {
        for (let i = 0; i < 105; i++) {
            debugLog.log(`m${i}`);
        }

        const logs = debugLog.getLogs();
        expect(logs).toHaveLength(100);
        expect(logs[0].message).toBe('m104');
        expect(logs[99].message).toBe('m5');
    });

    it('notifies subscribers until they unsubscribe', () => {
        const seen: LogEntry[] = [];
        const unsubscribe = debugLog.subscribe(entry => seen.push(entry));

        debugLog.warn('watched');
        unsubscribe();
        debugLog.warn('unwatched');

        expect(seen.map(e => e.message)).toEqual(['watched']);
    });

    it('echoes to the console at the matching level', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        debugLog.setEcho(true);

        debugLog.warn('careful');
        debugLog.error('broken');

        expect(warn).toHaveBeenCalledWith('[DEBUG] careful');
        expect(error).toHaveBeenCalledWith('[DEBUG] broken');
    });

    it('stays quiet with echo disabled', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        debugLog.log('silent');
        expect(log).not.toHaveBeenCalled();
        expect(debugLog.getLogs()).toHaveLength(1);
    });
});
