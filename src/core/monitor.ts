/**
 * Rangewatch Connection Monitor
 *
 * The polling loop. Each cycle:
 * 1. Stops if the abort signal fired
 * 2. Samples the connection table
 * 3. Classifies every established connection
 * 4. Arms and dispatches alerts for targeted endpoints
 * 5. Reconciles alert memory against the sample
 * 6. Sleeps for the interval, waking early on abort
 *
 * A failed sample skips the cycle and leaves alert memory untouched.
 * Any other error stops the loop and is re-thrown.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { type ConnectionSample, type ConnectionSampler, isEstablished } from './connections.js';
import { type RangeMatcher } from './matcher.js';
import { AlertStateTracker, type AlertEvent } from './tracker.js';
import { type AlertDispatcher } from './dispatcher.js';
import { type CycleReport, type StopReason, MonitorHooks } from './hooks.js';
import { SamplingError } from './errors.js';

/**
 * Abortable sleep; resolves early (without throwing) when the signal fires
 */
export type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleeper = async (ms, signal) => {
    try {
        await delay(ms, undefined, { signal });
    } catch (err) {
        if (!signal.aborted) {
            throw err;
        }
    }
};

export interface MonitorOptions {
    sampler: ConnectionSampler;
    matcher: RangeMatcher;
    dispatcher: AlertDispatcher;
    /** Milliseconds between cycles */
    intervalMs: number;
    /** Starts with empty memory if not provided */
    tracker?: AlertStateTracker;
    hooks?: MonitorHooks;
    sleep?: Sleeper;
    /** Clock used for alert timestamps */
    now?: () => Date;
}

export class ConnectionMonitor {
    readonly tracker: AlertStateTracker;
    readonly hooks: MonitorHooks;
    private readonly sampler: ConnectionSampler;
    private readonly matcher: RangeMatcher;
    private readonly dispatcher: AlertDispatcher;
    private readonly intervalMs: number;
    private readonly sleep: Sleeper;
    private readonly now: () => Date;
    private cycleCount = 0;

    constructor(options: MonitorOptions) {
        this.sampler = options.sampler;
        this.matcher = options.matcher;
        this.dispatcher = options.dispatcher;
        this.intervalMs = options.intervalMs;
        this.tracker = options.tracker ?? new AlertStateTracker();
        this.hooks = options.hooks ?? new MonitorHooks();
        this.sleep = options.sleep ?? abortableSleep;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Number of cycles run so far
     */
    getCycleCount(): number {
        return this.cycleCount;
    }

    /**
     * Runs one sample → classify → alert → reconcile pass.
     * The signal cuts short notification delivery, not the pass itself.
     */
    async runCycle(signal?: AbortSignal): Promise<CycleReport> {
        this.cycleCount++;
        const cycle = this.cycleCount;

        let samples: ConnectionSample[];
        try {
            samples = await this.sampler.sample();
        } catch (err) {
            if (err instanceof SamplingError) {
                return {
                    cycle,
                    observed: 0,
                    targeted: 0,
                    excluded: 0,
                    alerts: [],
                    forgotten: [],
                    remembered: this.tracker.size,
                    skipped: err.message,
                };
            }
            throw err;
        }

        const alerts: AlertEvent[] = [];
        let observed = 0;
        let targeted = 0;
        let excluded = 0;

        for (const sample of samples) {
            if (!isEstablished(sample)) continue;
            observed++;

            const classification = this.matcher.classify(sample.remoteAddress);
            if (classification.kind === 'excluded') {
                excluded++;
                continue;
            }
            if (classification.kind !== 'targeted') continue;
            targeted++;

            const event = this.tracker.arm(sample, classification.range, this.now());
            if (event) {
                await this.dispatcher.dispatch(event, signal);
                alerts.push(event);
                await this.hooks.emit('alert', event);
            }
        }

        const forgotten = this.tracker.reconcile(samples);

        return {
            cycle,
            observed,
            targeted,
            excluded,
            alerts,
            forgotten,
            remembered: this.tracker.size,
        };
    }

    /**
     * Runs cycles until the signal aborts
     *
     * @returns Resolves once the loop has stopped cleanly
     * @throws The first unexpected error raised during a cycle
     */
    async run(signal: AbortSignal): Promise<void> {
        await this.hooks.emit('start', undefined);

        let reason: StopReason = 'aborted';
        try {
            while (!signal.aborted) {
                const report = await this.runCycle(signal);
                await this.hooks.emit('cycle', report);

                if (signal.aborted) break;
                await this.sleep(this.intervalMs, signal);
            }
        } catch (err) {
            reason = 'failed';
            throw err;
        } finally {
            await this.hooks.emit('stop', reason);
        }
    }
}

