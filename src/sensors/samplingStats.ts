import { TILT_CONFIG } from '../core/tiltConfig';
import { getMedian, getPercentile } from '../core/stats';
import type { TickHealth } from './sensorTypes';

export class SamplingHealthMonitor {
    private lastTs: number | null = null;
    private firstTs: number | null = null;
    private intervalsMs: number[] = [];
    private count: number = 0;
    private readonly windowSize: number;

    constructor(windowSize: number = TILT_CONFIG.sampling.healthWindowSize) {
        this.windowSize = windowSize;
    }

    record(timestamp: number) {
        if (!Number.isFinite(timestamp)) return;
        if (this.firstTs === null) this.firstTs = timestamp;

        if (this.lastTs !== null) {
            this.intervalsMs.push((timestamp - this.lastTs) * 1000);
            if (this.intervalsMs.length > this.windowSize) {
                this.intervalsMs.shift();
            }
        }

        this.lastTs = timestamp;
        this.count++;
    }

    getStats(): TickHealth {
        if (this.count === 0 || this.firstTs === null || this.lastTs === null) {
            return { samplesCount: 0, observedHz: 0, dtMsMedian: null, dtMsP95: null, lastTimestamp: null };
        }

        // dt stats are meaningless with fewer than 3 ticks
        let median: number | null = null;
        let p95: number | null = null;
        if (this.count >= 3 && this.intervalsMs.length > 0) {
            const sorted = [...this.intervalsMs].sort((a, b) => a - b);
            median = getMedian(sorted);
            p95 = getPercentile(sorted, 0.95);
        }

        const duration = this.lastTs - this.firstTs;
        const observedHz = duration > 0 ? (this.count - 1) / duration : 0;

        return {
            samplesCount: this.count,
            observedHz: Number(observedHz.toFixed(1)),
            dtMsMedian: median !== null ? Number(median.toFixed(2)) : null,
            dtMsP95: p95 !== null ? Number(p95.toFixed(2)) : null,
            lastTimestamp: this.lastTs
        };
    }

    reset() {
        this.lastTs = null;
        this.firstTs = null;
        this.intervalsMs = [];
        this.count = 0;
    }
}
