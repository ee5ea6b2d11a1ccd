/**
 * Alert State Tracker Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AlertStateTracker } from '../../src/core/tracker.js';
import { parseRange } from '../../src/core/ranges.js';
import { conn } from '../support/fakes.js';

describe('AlertStateTracker', () => {
    const range = parseRange('192.168.0.0/16');
    let tracker: AlertStateTracker;

    beforeEach(() => {
        tracker = new AlertStateTracker();
    });

    describe('arm', () => {
        it('should emit an event for an unseen endpoint', () => {
            const now = new Date('2026-03-01T12:00:00Z');
            const event = tracker.arm(conn('192.168.1.5', 22, { localPort: 51000, pid: 4242 }), range, now);

            expect(event).toEqual({
                key: '192.168.1.5:22',
                remoteAddress: '192.168.1.5',
                remotePort: 22,
                localPort: 51000,
                matchedRange: '192.168.0.0/16',
                pid: 4242,
                timestamp: now,
            });
            expect(tracker.has('192.168.1.5:22')).toBe(true);
        });

        it('should not emit twice for the same endpoint', () => {
            tracker.arm(conn('192.168.1.5', 22), range);

            expect(tracker.arm(conn('192.168.1.5', 22), range)).toBeNull();
            expect(tracker.size).toBe(1);
        });

        it('should treat a different local port or pid as the same endpoint', () => {
            tracker.arm(conn('192.168.1.5', 22, { localPort: 40000, pid: 1 }), range);

            expect(tracker.arm(conn('192.168.1.5', 22, { localPort: 40001, pid: 2 }), range)).toBeNull();
        });

        it('should treat a different remote port as a new endpoint', () => {
            tracker.arm(conn('192.168.1.5', 22), range);

            expect(tracker.arm(conn('192.168.1.5', 443), range)).not.toBeNull();
            expect(tracker.keys()).toEqual(['192.168.1.5:22', '192.168.1.5:443']);
        });

        it('should bracket IPv6 endpoints in the key', () => {
            const event = tracker.arm(conn('fd00::5', 443), parseRange('fd00::/8'));

            expect(event?.key).toBe('[fd00::5]:443');
        });
    });

    describe('reconcile', () => {
        it('should keep keys that are still present', () => {
            tracker.arm(conn('192.168.1.5', 22), range);

            expect(tracker.reconcile([conn('192.168.1.5', 22)])).toEqual([]);
            expect(tracker.has('192.168.1.5:22')).toBe(true);
        });

        it('should forget keys that are absent', () => {
            tracker.arm(conn('192.168.1.5', 22), range);
            tracker.arm(conn('192.168.1.6', 22), range);

            const forgotten = tracker.reconcile([conn('192.168.1.6', 22)]);

            expect(forgotten).toEqual(['192.168.1.5:22']);
            expect(tracker.keys()).toEqual(['192.168.1.6:22']);
        });

        it('should count presence from any established connection, targeted or not', () => {
            tracker.arm(conn('192.168.1.5', 22), range);

            // Same endpoint now reached from another local port; classification is not consulted
            tracker.reconcile([conn('192.168.1.5', 22, { localPort: 1234 })]);

            expect(tracker.has('192.168.1.5:22')).toBe(true);
        });

        it('should ignore connections that are not established', () => {
            tracker.arm(conn('192.168.1.5', 22), range);

            tracker.reconcile([conn('192.168.1.5', 22, { status: 'time-wait' })]);

            expect(tracker.size).toBe(0);
        });

        it('should be idempotent', () => {
            tracker.arm(conn('192.168.1.5', 22), range);
            tracker.arm(conn('192.168.1.6', 22), range);
            const observed = [conn('192.168.1.6', 22), conn('8.8.8.8', 53)];

            tracker.reconcile(observed);
            const after = tracker.keys();

            expect(tracker.reconcile(observed)).toEqual([]);
            expect(tracker.keys()).toEqual(after);
        });

        it('should never add keys', () => {
            tracker.reconcile([conn('192.168.1.5', 22)]);

            expect(tracker.size).toBe(0);
        });

        it('should re-arm an endpoint after one absent cycle', () => {
            expect(tracker.arm(conn('192.168.1.5', 22), range)).not.toBeNull();
            tracker.reconcile([conn('192.168.1.5', 22)]);
            expect(tracker.arm(conn('192.168.1.5', 22), range)).toBeNull();

            tracker.reconcile([]);

            expect(tracker.arm(conn('192.168.1.5', 22), range)).not.toBeNull();
        });
    });

    it('should start empty and clear', () => {
        expect(tracker.size).toBe(0);
        tracker.arm(conn('192.168.1.5', 22), range);
        tracker.clear();
        expect(tracker.keys()).toEqual([]);
    });
});
