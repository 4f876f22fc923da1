/**
 * Computes the percentile of a sorted numeric array.
 */
export const getPercentile = (sorted: number[], p: number): number | null => {
    if (sorted.length === 0) return null;
    if (!Number.isFinite(p)) return null;
    if (p <= 0) return sorted[0];
    if (p >= 1) return sorted[sorted.length - 1];
    const index = Math.ceil((sorted.length - 1) * p);
    return sorted[index];
};

/**
 * Computes the median of a sorted numeric array.
 */
export const getMedian = (sorted: number[]): number | null => {
    if (sorted.length === 0) return null;
    const mid = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 0) {
        return (sorted[mid - 1] + sorted[mid]) / 2;
    }
    return sorted[mid];
};

export const getMean = (values: number[]): number => {
    if (values.length === 0) return 0;
    return values.reduce((acc, v) => acc + v, 0) / values.length;
};

/**
 * Population standard deviation (divides by N).
 */
export const getStdDev = (values: number[]): number => {
    if (values.length === 0) return 0;
    const mean = getMean(values);
    const variance = values.reduce((acc, v) => acc + (v - mean) * (v - mean), 0) / values.length;
    return Math.sqrt(variance);
};

export interface IntervalStats {
    samplesCount: number;
    observedHz: number;
    dtMsMedian: number | null;
    dtMsP95: number | null;
}

/**
 * Timing statistics for a series of timestamps in seconds.
 * Interval stats stay null below 3 samples.
 */
export const computeIntervalStats = (timestamps: number[]): IntervalStats => {
    const samplesCount = timestamps.length;
    if (samplesCount < 2) {
        return { samplesCount, observedHz: 0, dtMsMedian: null, dtMsP95: null };
    }

    const intervalsMs: number[] = [];
    for (let i = 1; i < timestamps.length; i++) {
        const dtMs = (timestamps[i] - timestamps[i - 1]) * 1000;
        if (dtMs > 0) intervalsMs.push(dtMs);
    }

    if (samplesCount < 3 || intervalsMs.length === 0) {
        const duration = timestamps[timestamps.length - 1] - timestamps[0];
        const observedHz = duration > 0 ? (samplesCount - 1) / duration : 0;
        return { samplesCount, observedHz: Number(observedHz.toFixed(1)), dtMsMedian: null, dtMsP95: null };
    }

    const sorted = [...intervalsMs].sort((a, b) => a - b);
    const dtMsMedian = getMedian(sorted);
    const dtMsP95 = getPercentile(sorted, 0.95);
    const observedHz = dtMsMedian && dtMsMedian > 0 ? 1000 / dtMsMedian : 0;

    return {
        samplesCount,
        observedHz: Number(observedHz.toFixed(1)),
        dtMsMedian: dtMsMedian !== null ? Number(dtMsMedian.toFixed(2)) : null,
        dtMsP95: dtMsP95 !== null ? Number(dtMsP95.toFixed(2)) : null
    };
};
