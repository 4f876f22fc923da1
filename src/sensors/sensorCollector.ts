import { TILT_CONFIG } from '../core/tiltConfig';
import type { TiltEngine } from '../core';
import type { TickOutcome, TickResult } from '../core/types';
import type { Clock, SensorProvider } from './sensorTypes';

export const monotonicClock: Clock = {
    now: () => performance.now() / 1000
};

export interface TickerOptions {
    engine: TiltEngine;
    provider: SensorProvider;
    clock?: Clock;
    intervalMs?: number;
    onEstimate?: (result: TickResult) => void;
    onSkip?: (outcome: Extract<TickOutcome, { status: 'skipped' }>) => void;
}

export interface Ticker {
    stop: () => void;
    isRunning: () => boolean;
}

/**
 * Drives `engine.tick` at a fixed cadence. Scheduling lives out here;
 * the engine only transforms one tick at a time.
 */
export const startTicker = (options: TickerOptions): Ticker => {
    const {
        engine,
        provider,
        clock = monotonicClock,
        intervalMs = 1000 / TILT_CONFIG.sampling.rateHz,
        onEstimate,
        onSkip
    } = options;

    let running = true;

    const handle = setInterval(() => {
        const outcome = engine.tick(provider, clock);
        if (outcome.status === 'skipped') {
            onSkip?.(outcome);
            return;
        }
        onEstimate?.(outcome);
    }, intervalMs);

    return {
        stop: () => {
            if (!running) return;
            running = false;
            clearInterval(handle);
        },
        isRunning: () => running
    };
};
