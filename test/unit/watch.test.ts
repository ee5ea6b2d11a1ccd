/**
 * Watch Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runWatch, applyCliOverrides, type WatchDependencies } from '../../src/commands/watch.js';
import { createDefaultConfig } from '../../src/config.js';
import { ConfigError } from '../../src/core/errors.js';
import { colors, configureOutput } from '../../src/utils/ui.js';
import { type ConnectionSample } from '../../src/core/connections.js';
import { ScriptedSampler, FakeProcessInfo, RecordingSink, conn } from '../support/fakes.js';

describe('Watch Command', () => {
    let workDir: string;
    let log: MockInstance<typeof console.log>;
    let errorLog: MockInstance<typeof console.error>;

    beforeEach(async () => {
        workDir = join(tmpdir(), `rangewatch-watch-${Date.now()}-${Math.random().toString(36).slice(2)}`);
        await mkdir(workDir, { recursive: true });
        configureOutput({ quiet: false, verbose: false });
        log = vi.spyOn(console, 'log').mockImplementation(() => {});
        errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(workDir, { recursive: true, force: true });
    });

    /**
     * Dependencies that stop the monitor after the given number of cycles
     */
    function deps(
        env: NodeJS.ProcessEnv,
        script: ConnectionSample[][],
        cycles: number
    ): { deps: WatchDependencies; sampler: ScriptedSampler; sink: RecordingSink } {
        const controller = new AbortController();
        const sampler = new ScriptedSampler(script);
        const sink = new RecordingSink();
        let slept = 0;
        return {
            sampler,
            sink,
            deps: {
                workDir,
                env,
                sampler,
                processInfo: new FakeProcessInfo({ 501: 'wget' }),
                sinks: [sink],
                runningAsRoot: true,
                signal: controller.signal,
                sleep: async () => {
                    slept++;
                    if (slept >= cycles) controller.abort();
                },
            },
        };
    }

    it('should alert and exit cleanly when stopped', async () => {
        const sample = [conn('10.20.30.40', 8443, { pid: 501 }), conn('8.8.8.8', 53)];
        const { deps: d, sampler, sink } = deps(
            { TARGET_IP_RANGES: '10.0.0.0/8', EXCLUDE_IP_RANGES: '' },
            [sample, sample, sample],
            3
        );

        const code = await runWatch({}, d);

        expect(code).toBe(0);
        expect(sampler.calls).toBe(3);
        expect(sink.received).toHaveLength(1);
        expect(sink.received[0].processName).toBe('wget');
        expect(sink.received[0].event.key).toBe('10.20.30.40:8443');
        expect(log).toHaveBeenCalledWith(colors.cyan('ℹ'), 'No IP ranges excluded from monitoring');
        expect(log).toHaveBeenCalledWith(colors.cyan('ℹ'), 'Stopping network monitor...');
    });

    it('should prefer command-line ranges over the environment', async () => {
        const { deps: d, sink } = deps(
            { TARGET_IP_RANGES: '10.0.0.0/8' },
            [[conn('172.16.5.5', 22)]],
            1
        );

        const code = await runWatch({ targets: '172.16.0.0/12', exclude: '' }, d);

        expect(code).toBe(0);
        expect(sink.received.map(n => n.event.matchedRange)).toEqual(['172.16.0.0/12']);
    });

    it('should warn about skipped entries and keep going', async () => {
        const { deps: d } = deps({ TARGET_IP_RANGES: '10.0.0.0/8,bogus', EXCLUDE_IP_RANGES: '' }, [], 1);

        const code = await runWatch({}, d);

        expect(code).toBe(0);
        expect(log).toHaveBeenCalledWith(
            colors.yellow('⚠'),
            "Warning: Invalid IP range 'bogus': 'bogus' is not an IP address"
        );
    });

    it('should refuse to start without a valid target', async () => {
        const { deps: d, sampler } = deps({ TARGET_IP_RANGES: 'bogus' }, [], 1);

        const code = await runWatch({}, d);

        expect(code).toBe(1);
        expect(sampler.calls).toBe(0);
        expect(errorLog).toHaveBeenCalledWith(
            colors.red('✗'),
            'No valid target IP ranges configured. Set TARGET_IP_RANGES or targetRanges.'
        );
    });

    it('should refuse to start with an invalid interval', async () => {
        const { deps: d, sampler } = deps({}, [], 1);

        const code = await runWatch({ interval: 'soon' }, d);

        expect(code).toBe(1);
        expect(sampler.calls).toBe(0);
    });

    it('should warn when not running as root', async () => {
        const { deps: d } = deps({}, [], 1);

        await runWatch({}, { ...d, runningAsRoot: false });

        expect(log).toHaveBeenCalledWith(
            colors.yellow('⚠'),
            'Running without root privileges. Process details of other users\' connections will be missing.'
        );
    });

    it('should return 1 when monitoring fails unexpectedly', async () => {
        const { deps: d } = deps({}, [], 5);
        const failing = { sample: vi.fn().mockRejectedValue(new Error('boom')) };

        const code = await runWatch({}, { ...d, sampler: failing });

        expect(code).toBe(1);
        expect(errorLog).toHaveBeenCalledWith(colors.red('✗'), 'Error during monitoring: boom');
    });

    describe('applyCliOverrides', () => {
        it('should keep the config when no flags are given', () => {
            expect(applyCliOverrides(createDefaultConfig(), {})).toEqual(createDefaultConfig());
        });

        it('should disable desktop notifications with --no-desktop', () => {
            const config = applyCliOverrides(createDefaultConfig(), { desktop: false });

            expect(config.notifications.desktop.enabled).toBe(false);
        });

        it('should parse the interval flag', () => {
            expect(applyCliOverrides(createDefaultConfig(), { interval: '7' }).intervalSeconds).toBe(7);
            expect(() => applyCliOverrides(createDefaultConfig(), { interval: '0' })).toThrow(ConfigError);
        });
    });
});
