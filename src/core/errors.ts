/**
 * Rangewatch Errors
 *
 * Error types raised by the monitoring engine and its collaborators.
 * Only ConfigError is fatal at startup; the rest are recovered where they occur.
 */

/**
 * A single range specification could not be parsed
 */
export class RangeParseError extends Error {
    /** The offending text, as given */
    readonly input: string;

    constructor(input: string, reason: string) {
        super(`Invalid IP range '${input}': ${reason}`);
        this.name = 'RangeParseError';
        this.input = input;
    }
}

/**
 * Configuration cannot be used to start monitoring
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * The connection table could not be read this cycle
 */
export class SamplingError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SamplingError';
    }
}

/**
 * A notification sink failed to deliver an alert
 */
export class DispatchError extends Error {
    /** Name of the sink that failed */
    readonly sink: string;

    constructor(sink: string, message: string, options?: { cause?: unknown }) {
        super(`${sink}: ${message}`, options);
        this.name = 'DispatchError';
        this.sink = sink;
    }
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
