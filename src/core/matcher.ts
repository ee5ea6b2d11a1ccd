/**
 * Rangewatch Range Matcher
 *
 * Decides whether a remote address is in scope for alerting.
 * Exclusion always wins over targeting.
 */

import { type AddressRange, RangeSet } from './ranges.js';
import { ConfigError } from './errors.js';

/**
 * Outcome of classifying an address
 */
export type Classification =
    | { kind: 'excluded'; range: AddressRange }
    | { kind: 'targeted'; range: AddressRange }
    | { kind: 'ignored' };

/**
 * Combines a target set and an exclude set into one decision
 */
export class RangeMatcher {
    readonly targets: RangeSet;
    readonly excludes: RangeSet;

    constructor(targets: RangeSet, excludes: RangeSet = new RangeSet([])) {
        if (targets.isEmpty()) {
            throw new ConfigError('No valid target IP ranges configured');
        }
        this.targets = targets;
        this.excludes = excludes;
    }

    classify(address: string): Classification {
        const excluded = this.excludes.firstMatch(address);
        if (excluded) {
            return { kind: 'excluded', range: excluded };
        }

        const targeted = this.targets.firstMatch(address);
        if (targeted) {
            return { kind: 'targeted', range: targeted };
        }

        return { kind: 'ignored' };
    }
}
