/**
 * Thin wrappers around execa so collectors and notifiers can be tested
 * with an in-process stand-in.
 */

import { execa } from 'execa';

export interface RunOptions {
    /** Kills the command when aborted */
    signal?: AbortSignal;
}

/**
 * Runs a command and resolves with its stdout; rejects if it fails to start, exits non-zero or is cancelled
 */
export type CommandRunner = (file: string, args: readonly string[], options?: RunOptions) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, options = {}) => {
    const result = await execa(file, args, { cancelSignal: options.signal });
    return result.stdout;
};

/**
 * Checks whether an executable is on PATH
 */
export async function commandExists(name: string): Promise<boolean> {
    try {
        await execa('which', [name]);
        return true;
    } catch {
        return false;
    }
}

/**
 * Whether the current process runs with root privileges.
 * Always false where the platform has no user IDs.
 */
export function isRoot(): boolean {
    return typeof process.geteuid === 'function' && process.geteuid() === 0;
}
