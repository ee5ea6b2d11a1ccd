import { Command } from 'commander';
import { colors, error, configureOutput } from '../utils/ui.js';
import { addressFamily } from '../core/ranges.js';
import { RangeMatcher, type Classification } from '../core/matcher.js';
import { errorMessage } from '../core/errors.js';
import { prepareSettings, type WatchOptions } from './watch.js';

/**
 * One classified address
 */
export interface CheckResult {
    address: string;
    /** Null when the input is not an IP address */
    classification: Classification | null;
}

/**
 * Classifies each address with the given matcher
 */
export function checkAddresses(matcher: RangeMatcher, addresses: string[]): CheckResult[] {
    return addresses.map(address => ({
        address,
        classification: addressFamily(address) === null ? null : matcher.classify(address),
    }));
}

/**
 * Renders one check result as a line of text
 */
export function formatCheckResult(result: CheckResult): string {
    const { address, classification } = result;
    if (!classification) {
        return `${address}: ${colors.red('not an IP address')}`;
    }
    switch (classification.kind) {
        case 'excluded':
            return `${address}: ${colors.dim('excluded')} by ${classification.range.toString()}`;
        case 'targeted':
            return `${address}: ${colors.yellow('targeted')} by ${classification.range.toString()}`;
        case 'ignored':
            return `${address}: ignored`;
    }
}

export function registerCheckCommand(program: Command) {
    /**
     * Check Command
     * Shows how addresses classify against the effective configuration
     */
    program
        .command('check')
        .description('Show whether addresses would be alerted on')
        .argument('<address...>', 'IP addresses to classify')
        .option('-t, --targets <ranges>', 'Comma-separated target CIDR list')
        .option('-x, --exclude <ranges>', 'Comma-separated excluded CIDR list')
        .action(async (addresses: string[], options: Pick<WatchOptions, 'targets' | 'exclude'>) => {
            try {
                const opts = program.opts();
                configureOutput({ quiet: opts.quiet ?? false, verbose: opts.verbose ?? false });

                const prepared = await prepareSettings(options);
                if (!prepared) {
                    process.exit(1);
                }

                const { targets, excludes } = prepared.settings;
                const matcher = new RangeMatcher(targets, excludes);
                for (const result of checkAddresses(matcher, addresses)) {
                    console.log(formatCheckResult(result));
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
