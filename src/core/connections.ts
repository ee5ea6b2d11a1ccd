/**
 * Rangewatch Connection Types
 *
 * Shapes shared by samplers, the alert tracker and notification sinks.
 */

/**
 * TCP socket state as reported by the connection table
 */
export type ConnectionStatus =
    | 'established'
    | 'syn-sent'
    | 'syn-recv'
    | 'fin-wait-1'
    | 'fin-wait-2'
    | 'time-wait'
    | 'close-wait'
    | 'last-ack'
    | 'closing'
    | 'closed'
    | 'listen'
    | 'unknown';

/**
 * One row of the connection table, captured during a single cycle
 */
export interface ConnectionSample {
    readonly localPort: number;
    readonly remoteAddress: string;
    readonly remotePort: number;
    /** Owning process, when it could be determined */
    readonly pid?: number;
    readonly status: ConnectionStatus;
}

/**
 * Produces the host's current connections
 */
export interface ConnectionSampler {
    sample(): Promise<ConnectionSample[]>;
}

/**
 * Resolves a process ID to a readable name.
 * Implementations return UNKNOWN_PROCESS instead of failing.
 */
export interface ProcessInfo {
    nameOf(pid: number): Promise<string>;
}

/** Name reported when a process cannot be inspected */
export const UNKNOWN_PROCESS = 'Unknown';

/**
 * Deduplication identity of a connection: remote address and port
 */
export type EndpointKey = string;

/**
 * Builds the endpoint key for a remote address and port.
 * IPv6 addresses are bracketed so the port separator stays unambiguous.
 */
export function endpointKey(remoteAddress: string, remotePort: number): EndpointKey {
    return remoteAddress.includes(':')
        ? `[${remoteAddress}]:${remotePort}`
        : `${remoteAddress}:${remotePort}`;
}

/**
 * Key of a sampled connection
 */
export function sampleKey(sample: ConnectionSample): EndpointKey {
    return endpointKey(sample.remoteAddress, sample.remotePort);
}

export function isEstablished(sample: ConnectionSample): boolean {
    return sample.status === 'established';
}
