/**
 * Rangewatch Connection Table Sampler
 *
 * Reads the host's TCP connection table through iproute2's `ss`.
 *
 * Each row of `ss -Htnp` looks like:
 *   ESTAB 0 0 192.168.1.10:50522 140.82.112.3:443 users:(("firefox",pid=2301,fd=87))
 * The process column only appears for sockets the caller may inspect
 * (all of them when running as root).
 */

import {
    type ConnectionSample,
    type ConnectionSampler,
    type ConnectionStatus,
} from '../core/connections.js';
import { SamplingError, errorMessage } from '../core/errors.js';
import { unmapAddress } from '../core/ranges.js';
import { type CommandRunner, runCommand } from '../utils/exec.js';

/** Arguments passed to ss: TCP, numeric, with processes, no header */
export const SS_ARGS = ['-H', '-t', '-n', '-p'] as const;

const SS_STATES: Record<string, ConnectionStatus> = {
    'ESTAB': 'established',
    'SYN-SENT': 'syn-sent',
    'SYN-RECV': 'syn-recv',
    'FIN-WAIT-1': 'fin-wait-1',
    'FIN-WAIT-2': 'fin-wait-2',
    'TIME-WAIT': 'time-wait',
    'CLOSE-WAIT': 'close-wait',
    'LAST-ACK': 'last-ack',
    'CLOSING': 'closing',
    'UNCONN': 'closed',
    'LISTEN': 'listen',
};

/**
 * Splits an ss address column into address and port.
 * Handles [v6]:port, bare v6 with a trailing :port, zone suffixes and IPv4-mapped addresses.
 */
export function parseEndpoint(field: string): { address: string; port: number } | null {
    let address: string;
    let portText: string;

    const bracketed = field.match(/^\[(.+)\]:(\d+|\*)$/);
    if (bracketed) {
        address = bracketed[1];
        portText = bracketed[2];
    } else {
        const lastColon = field.lastIndexOf(':');
        if (lastColon === -1) return null;
        address = field.substring(0, lastColon);
        portText = field.substring(lastColon + 1);
    }

    if (!/^\d+$/.test(portText)) return null;
    const port = parseInt(portText, 10);
    if (port > 65535) return null;

    const zone = address.indexOf('%');
    if (zone !== -1) {
        address = address.substring(0, zone);
    }

    return { address: unmapAddress(address), port };
}

/**
 * Extracts the first owning PID from a users:(("name",pid=N,fd=M)) column
 */
export function parseOwnerPid(line: string): number | undefined {
    const match = line.match(/users:\(\(.*?pid=(\d+)/);
    return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Parses `ss -Htnp` output into samples. Unrecognised rows are skipped.
 */
export function parseSsOutput(output: string): ConnectionSample[] {
    const samples: ConnectionSample[] = [];

    for (const line of output.split('\n')) {
        const trimmed = line.trim();
        // Header row, in case the ss build ignores -H
        if (!trimmed || trimmed.startsWith('State') || trimmed.startsWith('Netid')) continue;

        const parts = trimmed.split(/\s+/);
        if (parts.length < 5) continue;

        const [stateText, , , localField, peerField] = parts;
        const local = parseEndpoint(localField);
        const peer = parseEndpoint(peerField);
        if (!local || !peer) continue;

        samples.push({
            localPort: local.port,
            remoteAddress: peer.address,
            remotePort: peer.port,
            pid: parseOwnerPid(trimmed),
            status: SS_STATES[stateText] ?? 'unknown',
        });
    }

    return samples;
}

export interface SsSamplerOptions {
    /** ss executable */
    command?: string;
    runner?: CommandRunner;
}

/**
 * Samples connections by running ss
 */
export class SsConnectionSampler implements ConnectionSampler {
    private readonly command: string;
    private readonly runner: CommandRunner;

    constructor(options: SsSamplerOptions = {}) {
        this.command = options.command ?? 'ss';
        this.runner = options.runner ?? runCommand;
    }

    async sample(): Promise<ConnectionSample[]> {
        let output: string;
        try {
            output = await this.runner(this.command, SS_ARGS);
        } catch (err) {
            throw new SamplingError(`Failed to read connection table: ${errorMessage(err)}`, { cause: err });
        }
        return parseSsOutput(output);
    }
}

/**
 * Creates the default connection sampler
 */
export function createConnectionSampler(options?: SsSamplerOptions): ConnectionSampler {
    return new SsConnectionSampler(options);
}
