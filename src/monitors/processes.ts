/**
 * Rangewatch Process Lookup
 *
 * Resolves PIDs to command names through procfs.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type ProcessInfo, UNKNOWN_PROCESS } from '../core/connections.js';

export class ProcfsProcessInfo implements ProcessInfo {
    private readonly procRoot: string;

    constructor(procRoot: string = '/proc') {
        this.procRoot = procRoot;
    }

    /**
     * Name from /proc/<pid>/comm, or "Unknown" if the process is gone or unreadable
     */
    async nameOf(pid: number): Promise<string> {
        if (!Number.isInteger(pid) || pid <= 0) {
            return UNKNOWN_PROCESS;
        }

        try {
            const name = (await readFile(join(this.procRoot, String(pid), 'comm'), 'utf8')).trim();
            return name || UNKNOWN_PROCESS;
        } catch {
            return UNKNOWN_PROCESS;
        }
    }
}

/**
 * Creates the default process lookup
 */
export function createProcessInfo(procRoot?: string): ProcessInfo {
    return new ProcfsProcessInfo(procRoot);
}
