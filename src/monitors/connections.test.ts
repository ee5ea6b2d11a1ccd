/**
 * Connection Table Sampler Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
    SsConnectionSampler,
    SS_ARGS,
    parseEndpoint,
    parseOwnerPid,
    parseSsOutput,
} from './connections.js';
import { SamplingError } from '../core/errors.js';

const SS_OUTPUT = [
    'ESTAB      0      0      192.168.1.10:50522    140.82.112.3:443   users:(("firefox",pid=2301,fd=87))',
    'ESTAB      0      0      10.0.0.5:41000        10.0.0.9:5432',
    'SYN-SENT   0      1      10.0.0.5:41002        10.0.0.20:22       users:(("ssh",pid=77,fd=3))',
    'ESTAB      0      0      [2001:db8::5]:50100   [2001:db8::1]:22   users:(("ssh",pid=78,fd=3))',
    'ESTAB      0      0      [::ffff:10.0.0.5]:8080 [::ffff:10.0.0.42]:61000 users:(("node",pid=900,fd=21))',
    '',
    'garbage',
].join('\n');

describe('Connection Table Sampler', () => {
    describe('parseEndpoint', () => {
        it('should split IPv4 address and port', () => {
            expect(parseEndpoint('10.0.0.9:5432')).toEqual({ address: '10.0.0.9', port: 5432 });
        });

        it('should handle bracketed IPv6', () => {
            expect(parseEndpoint('[2001:db8::1]:22')).toEqual({ address: '2001:db8::1', port: 22 });
        });

        it('should strip zone suffixes', () => {
            expect(parseEndpoint('[fe80::1%eth0]:22')).toEqual({ address: 'fe80::1', port: 22 });
        });

        it('should unmap IPv4-mapped addresses', () => {
            expect(parseEndpoint('[::ffff:10.0.0.42]:61000')).toEqual({ address: '10.0.0.42', port: 61000 });
        });

        it('should reject wildcard and out of range ports', () => {
            expect(parseEndpoint('*:*')).toBeNull();
            expect(parseEndpoint('10.0.0.1:70000')).toBeNull();
            expect(parseEndpoint('no-port')).toBeNull();
        });
    });

    describe('parseOwnerPid', () => {
        it('should read the first pid of the users column', () => {
            expect(parseOwnerPid('users:(("nginx",pid=10,fd=6),("nginx",pid=11,fd=6))')).toBe(10);
        });

        it('should return undefined without a users column', () => {
            expect(parseOwnerPid('ESTAB 0 0 10.0.0.5:41000 10.0.0.9:5432')).toBeUndefined();
        });
    });

    describe('parseSsOutput', () => {
        it('should parse every well-formed row', () => {
            expect(parseSsOutput(SS_OUTPUT)).toEqual([
                { localPort: 50522, remoteAddress: '140.82.112.3', remotePort: 443, pid: 2301, status: 'established' },
                { localPort: 41000, remoteAddress: '10.0.0.9', remotePort: 5432, pid: undefined, status: 'established' },
                { localPort: 41002, remoteAddress: '10.0.0.20', remotePort: 22, pid: 77, status: 'syn-sent' },
                { localPort: 50100, remoteAddress: '2001:db8::1', remotePort: 22, pid: 78, status: 'established' },
                { localPort: 8080, remoteAddress: '10.0.0.42', remotePort: 61000, pid: 900, status: 'established' },
            ]);
        });

        it('should skip a header row', () => {
            const output = 'State  Recv-Q Send-Q Local Address:Port Peer Address:Port Process\n'
                + 'ESTAB  0      0      10.0.0.5:41000     10.0.0.9:5432';

            expect(parseSsOutput(output)).toHaveLength(1);
        });

        it('should map unrecognised states to unknown', () => {
            expect(parseSsOutput('WEIRD 0 0 10.0.0.5:1 10.0.0.9:2')[0].status).toBe('unknown');
        });

        it('should return nothing for empty output', () => {
            expect(parseSsOutput('')).toEqual([]);
        });
    });

    describe('SsConnectionSampler', () => {
        it('should run ss and parse its output', async () => {
            const runner = vi.fn().mockResolvedValue(SS_OUTPUT);
            const sampler = new SsConnectionSampler({ runner });

            const samples = await sampler.sample();

            expect(runner).toHaveBeenCalledWith('ss', SS_ARGS);
            expect(samples).toHaveLength(5);
        });

        it('should raise a SamplingError when ss fails', async () => {
            const runner = vi.fn().mockRejectedValue(new Error('spawn ss ENOENT'));
            const sampler = new SsConnectionSampler({ command: 'ss', runner });

            const failure = sampler.sample();

            await expect(failure).rejects.toBeInstanceOf(SamplingError);
            await expect(failure).rejects.toThrow('Failed to read connection table: spawn ss ENOENT');
        });
    });
});
