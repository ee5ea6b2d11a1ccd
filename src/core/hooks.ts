/**
 * Rangewatch Monitor Hooks
 *
 * Lets callers observe the monitoring loop without touching its state.
 *
 * Hook Types:
 * - start: Called once before the first cycle
 * - cycle: Called after every completed cycle with its report
 * - alert: Called for every alert, after it has been dispatched
 * - stop: Called once when the loop exits, with the reason
 */

import { type AlertEvent } from './tracker.js';
import { type EndpointKey } from './connections.js';

/**
 * Summary of one completed cycle
 */
export interface CycleReport {
    /** 1-based cycle counter */
    cycle: number;
    /** Established connections seen this cycle */
    observed: number;
    /** Established connections that classified as targeted */
    targeted: number;
    /** Established connections that classified as excluded */
    excluded: number;
    /** Alerts fired this cycle */
    alerts: AlertEvent[];
    /** Keys dropped from alert memory at reconciliation */
    forgotten: EndpointKey[];
    /** Keys in alert memory after reconciliation */
    remembered: number;
    /** Set when sampling failed and the cycle was skipped */
    skipped?: string;
}

/**
 * Why the loop stopped
 */
export type StopReason = 'aborted' | 'failed';

/**
 * Payloads by hook event
 */
export interface MonitorHookEvents {
    start: void;
    cycle: CycleReport;
    alert: AlertEvent;
    stop: StopReason;
}

export type MonitorHookEvent = keyof MonitorHookEvents;

/**
 * Hook callback
 */
export type MonitorHook<E extends MonitorHookEvent> = (payload: MonitorHookEvents[E]) => void | Promise<void>;

type RegisteredHooks = {
    [E in MonitorHookEvent]: MonitorHook<E>[];
};

/**
 * Hook manager for registering and executing monitor hooks
 */
export class MonitorHooks {
    private hooks: RegisteredHooks = {
        start: [],
        cycle: [],
        alert: [],
        stop: [],
    };

    /**
     * Registers a hook
     */
    on<E extends MonitorHookEvent>(event: E, hook: MonitorHook<E>): void {
        this.hooks[event].push(hook);
    }

    /**
     * Removes a hook
     */
    off<E extends MonitorHookEvent>(event: E, hook: MonitorHook<E>): void {
        const hooks = this.hooks[event];
        const index = hooks.indexOf(hook);
        if (index !== -1) {
            hooks.splice(index, 1);
        }
    }

    /**
     * Executes hooks for an event in registration order
     */
    async emit<E extends MonitorHookEvent>(event: E, payload: MonitorHookEvents[E]): Promise<void> {
        const hooks: MonitorHook<E>[] = this.hooks[event];
        for (const hook of hooks) {
            await hook(payload);
        }
    }

    /**
     * Clears all registered hooks
     */
    clear(): void {
        this.hooks = {
            start: [],
            cycle: [],
            alert: [],
            stop: [],
        };
    }

    /**
     * Gets the count of registered hooks
     */
    getHookCount(): Record<MonitorHookEvent, number> {
        return {
            start: this.hooks.start.length,
            cycle: this.hooks.cycle.length,
            alert: this.hooks.alert.length,
            stop: this.hooks.stop.length,
        };
    }
}

/**
 * Creates a new hook manager instance
 */
export function createMonitorHooks(): MonitorHooks {
    return new MonitorHooks();
}
