/**
 * Rangewatch Address Ranges
 *
 * CIDR parsing and membership tests for the target and exclude lists.
 *
 * Accepted forms:
 * - IPv4 or IPv6 network with prefix: 10.0.0.0/8, fd00::/8
 * - IPv4 network with a netmask or hostmask: 10.0.0.0/255.0.0.0, 10.0.0.0/0.255.255.255
 * - Bare address, treated as a single host: 192.168.1.1 (/32), ::1 (/128)
 *
 * A network with host bits set below its prefix (10.10.0.0/8) is rejected.
 */

import { isIP } from 'node:net';
import IPCIDR from 'ip-cidr';
import { RangeParseError } from './errors.js';

/** Address family of a range or address */
export type AddressFamily = 4 | 6;

const FAMILY_WIDTH: Record<AddressFamily, number> = {
    4: 32,
    6: 128,
};

/**
 * Returns the family of a textual address, or null if it is not an IP address
 */
export function addressFamily(address: string): AddressFamily | null {
    const family = isIP(address);
    if (family === 4 || family === 6) {
        return family;
    }
    return null;
}

/**
 * Converts an IPv4-mapped IPv6 address (::ffff:a.b.c.d) to its IPv4 form.
 * Other addresses are returned unchanged.
 */
export function unmapAddress(address: string): string {
    const match = address.match(/^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i);
    if (match && isIP(match[1]) === 4) {
        return match[1];
    }
    return address;
}

function ipv4ToInt(address: string): number {
    return address.split('.').reduce((acc, octet) => acc * 256 + parseInt(octet, 10), 0);
}

/**
 * Prefix length of a contiguous run of leading one bits, or null
 */
function leadingOnes(value: number): number | null {
    for (let prefix = 0; prefix <= 32; prefix++) {
        const mask = prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;
        if (mask === value) {
            return prefix;
        }
    }
    return null;
}

/**
 * Prefix length given by a dotted IPv4 netmask (255.0.0.0) or hostmask (0.255.255.255).
 * A netmask reading takes precedence.
 */
export function maskToPrefix(mask: string): number | null {
    if (isIP(mask) !== 4) {
        return null;
    }
    const value = ipv4ToInt(mask);
    return leadingOnes(value) ?? leadingOnes((~value) >>> 0);
}

/**
 * A contiguous block of addresses: network address plus prefix length
 */
export class AddressRange {
    readonly family: AddressFamily;
    readonly prefix: number;
    /** Network address */
    readonly network: string;
    private readonly cidr: IPCIDR;

    private constructor(cidr: IPCIDR, family: AddressFamily, prefix: number) {
        this.cidr = cidr;
        this.family = family;
        this.prefix = prefix;
        this.network = String(cidr.start());
        Object.freeze(this);
    }

    /**
     * Parses a range specification
     *
     * @throws RangeParseError when the text is not a valid network/prefix
     */
    static parse(text: string): AddressRange {
        const input = text.trim();
        if (!input) {
            throw new RangeParseError(text, 'empty specification');
        }

        const parts = input.split('/');
        if (parts.length > 2) {
            throw new RangeParseError(text, 'more than one "/"');
        }

        const [address, prefixText] = parts;
        const family = addressFamily(address);
        if (family === null) {
            throw new RangeParseError(text, `'${address}' is not an IP address`);
        }

        const width = FAMILY_WIDTH[family];
        let prefix = width;
        if (prefixText !== undefined) {
            if (/^\d{1,3}$/.test(prefixText)) {
                prefix = parseInt(prefixText, 10);
            } else {
                const fromMask = family === 4 ? maskToPrefix(prefixText) : null;
                if (fromMask === null) {
                    throw new RangeParseError(text, `'${prefixText}' is not a prefix length`);
                }
                prefix = fromMask;
            }
            if (prefix > width) {
                throw new RangeParseError(text, `prefix /${prefix} exceeds ${width} bits`);
            }
        }

        const normalized = `${address}/${prefix}`;
        if (!IPCIDR.isValidCIDR(normalized)) {
            throw new RangeParseError(text, 'not a valid CIDR block');
        }

        const cidr = new IPCIDR(normalized);
        const host = new IPCIDR(`${address}/${width}`);
        if (String(cidr.start()) !== String(host.start())) {
            throw new RangeParseError(text, `${address}/${prefix} has host bits set`);
        }

        return new AddressRange(cidr, family, prefix);
    }

    /**
     * Tests whether an address lies inside this range.
     * Addresses of the other family, or unparseable ones, are never members.
     */
    contains(address: string): boolean {
        const candidate = unmapAddress(address);
        if (addressFamily(candidate) !== this.family) {
            return false;
        }
        return this.cidr.contains(candidate);
    }

    /**
     * Canonical label, e.g. 10.0.0.0/8
     */
    toString(): string {
        return `${this.network}/${this.prefix}`;
    }
}

/**
 * Parses a single range specification
 */
export function parseRange(text: string): AddressRange {
    return AddressRange.parse(text);
}

/**
 * Result of parsing a list of range specifications
 */
export interface RangeListResult {
    /** Valid ranges, in input order */
    ranges: AddressRange[];
    /** One error per rejected entry */
    errors: RangeParseError[];
}

/**
 * Parses a comma-separated string or a list of range specifications.
 * Each entry is parsed on its own: malformed entries are reported and skipped.
 */
export function parseRangeList(specs: string | readonly string[]): RangeListResult {
    const entries = typeof specs === 'string' ? specs.split(',') : specs.flatMap(s => s.split(','));
    const ranges: AddressRange[] = [];
    const errors: RangeParseError[] = [];

    for (const entry of entries) {
        const trimmed = entry.trim();
        if (!trimmed) continue;

        try {
            ranges.push(AddressRange.parse(trimmed));
        } catch (err) {
            if (err instanceof RangeParseError) {
                errors.push(err);
            } else {
                throw err;
            }
        }
    }

    return { ranges, errors };
}

/**
 * Ordered, immutable collection of address ranges.
 * Membership is the union of all ranges; order only decides which range is reported.
 */
export class RangeSet {
    private readonly ranges: readonly AddressRange[];

    constructor(ranges: Iterable<AddressRange>) {
        this.ranges = Object.freeze([...ranges]);
    }

    /**
     * Builds a set from specifications, returning the rejected entries alongside
     */
    static fromSpecs(specs: string | readonly string[]): { set: RangeSet; errors: RangeParseError[] } {
        const { ranges, errors } = parseRangeList(specs);
        return { set: new RangeSet(ranges), errors };
    }

    get size(): number {
        return this.ranges.length;
    }

    isEmpty(): boolean {
        return this.ranges.length === 0;
    }

    contains(address: string): boolean {
        return this.firstMatch(address) !== null;
    }

    /**
     * First range, in configuration order, that contains the address
     */
    firstMatch(address: string): AddressRange | null {
        for (const range of this.ranges) {
            if (range.contains(address)) {
                return range;
            }
        }
        return null;
    }

    labels(): string[] {
        return this.ranges.map(r => r.toString());
    }

    [Symbol.iterator](): Iterator<AddressRange> {
        return this.ranges[Symbol.iterator]();
    }
}
