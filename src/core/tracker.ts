/**
 * Rangewatch Alert State Tracker
 *
 * Remembers which endpoints have already been alerted.
 *
 * Per endpoint key there are two states:
 * - Unseen: not in memory. A targeted sample fires an alert and moves it to Alerted.
 * - Alerted: in memory. Further samples of the same key fire nothing.
 *
 * At the end of every cycle, memory is intersected with the keys of all
 * established connections in that cycle's sample. A key that was absent for
 * one cycle is Unseen again and can alert on its next appearance.
 */

import { type AddressRange } from './ranges.js';
import {
    type ConnectionSample,
    type EndpointKey,
    isEstablished,
    sampleKey,
} from './connections.js';

/**
 * Emitted when an endpoint moves from Unseen to Alerted
 */
export interface AlertEvent {
    key: EndpointKey;
    remoteAddress: string;
    remotePort: number;
    localPort: number;
    /** Label of the target range that matched, e.g. 10.0.0.0/8 */
    matchedRange: string;
    pid?: number;
    timestamp: Date;
}

export class AlertStateTracker {
    private readonly memory: Set<EndpointKey> = new Set();

    /**
     * Arms an alert for a targeted sample.
     * Returns the event if the endpoint was Unseen, null if it is already Alerted.
     */
    arm(sample: ConnectionSample, matchedRange: AddressRange, now: Date = new Date()): AlertEvent | null {
        const key = sampleKey(sample);
        if (this.memory.has(key)) {
            return null;
        }

        this.memory.add(key);

        return {
            key,
            remoteAddress: sample.remoteAddress,
            remotePort: sample.remotePort,
            localPort: sample.localPort,
            matchedRange: matchedRange.toString(),
            pid: sample.pid,
            timestamp: now,
        };
    }

    /**
     * Drops every remembered key not present among this cycle's established connections
     *
     * @returns Keys that were forgotten
     */
    reconcile(samples: readonly ConnectionSample[]): EndpointKey[] {
        const observed = new Set<EndpointKey>();
        for (const sample of samples) {
            if (isEstablished(sample)) {
                observed.add(sampleKey(sample));
            }
        }

        const forgotten: EndpointKey[] = [];
        for (const key of this.memory) {
            if (!observed.has(key)) {
                forgotten.push(key);
            }
        }
        for (const key of forgotten) {
            this.memory.delete(key);
        }

        return forgotten;
    }

    has(key: EndpointKey): boolean {
        return this.memory.has(key);
    }

    keys(): EndpointKey[] {
        return [...this.memory];
    }

    get size(): number {
        return this.memory.size;
    }

    clear(): void {
        this.memory.clear();
    }
}
