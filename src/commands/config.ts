import { Command } from 'commander';
import { colors, success, error } from '../utils/ui.js';
import {
    loadConfig,
    loadConfigFile,
    mergeConfig,
    saveConfig,
    isInitialized,
    getConfigPath,
    type RangewatchConfig,
} from '../config.js';
import { errorMessage } from '../core/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a dotted path such as notifications.desktop.enabled
 */
export function getConfigValue(config: RangewatchConfig, path: string): unknown {
    let value: unknown = config;
    for (const key of path.split('.')) {
        value = isRecord(value) ? value[key] : undefined;
    }
    return value;
}

/**
 * Parses a value given on the command line.
 * Lists become arrays when the current value is a list.
 */
function parseValue(raw: string, current: unknown): unknown {
    if (Array.isArray(current)) return raw.split(',').map(s => s.trim()).filter(Boolean);
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    if (raw.trim() !== '' && !isNaN(Number(raw))) return Number(raw);
    return raw;
}

/**
 * Returns a copy of the config with one dotted path replaced, re-validated against the schema
 *
 * @throws Error if the path does not name an existing setting
 */
export function setConfigValue(config: RangewatchConfig, path: string, raw: string): RangewatchConfig {
    const copy: unknown = structuredClone(config);
    const keys = path.split('.');
    const last = keys.pop();

    let target: unknown = copy;
    for (const key of keys) {
        target = isRecord(target) ? target[key] : undefined;
    }
    if (!last || !isRecord(target) || !(last in target)) {
        throw new Error(`Unknown configuration key: ${path}`);
    }

    target[last] = parseValue(raw, target[last]);
    return mergeConfig(copy);
}

export function registerConfigCommand(program: Command) {
    /**
     * Config Command
     * View or edit configuration
     */
    program
        .command('config')
        .description('View or edit configuration')
        .option('--get <key>', 'Get a configuration value')
        .option('--set <key=value>', 'Set a configuration value')
        .option('--json', 'Output as JSON')
        .action(async (options: { get?: string; set?: string; json?: boolean }) => {
            try {
                if (options.set) {
                    const separator = options.set.indexOf('=');
                    if (separator === -1) {
                        error('Invalid format. Use --set key.path=value');
                    }
                    const path = options.set.slice(0, separator);
                    const value = options.set.slice(separator + 1);

                    const updated = setConfigValue(await loadConfigFile(), path, value);
                    await saveConfig(updated);
                    success(`Set ${path} = ${JSON.stringify(getConfigValue(updated, path))}`);
                    return;
                }

                const config = await loadConfig();

                if (options.json) {
                    console.log(JSON.stringify(config, null, 2));
                    return;
                }

                if (options.get) {
                    const value = getConfigValue(config, options.get);
                    console.log(value !== undefined ? JSON.stringify(value, null, 2) : 'undefined');
                    return;
                }

                // Default: show config summary
                const initialized = await isInitialized();
                console.log(colors.bold('\n⚙️  Rangewatch Configuration\n'));
                console.log(`  ${colors.bold('Config Path:')} ${initialized ? getConfigPath() : colors.dim('none (defaults)')}`);
                console.log();

                console.log(colors.bold('Ranges:'));
                console.log(`  Targets: ${colors.cyan(config.targetRanges.join(', ') || 'none')}`);
                console.log(`  Excluded: ${colors.cyan(config.excludeRanges.join(', ') || 'none')}`);
                console.log(`  Interval: ${config.intervalSeconds}s`);
                console.log();

                console.log(colors.bold('Notifications:'));
                console.log(`  Title: ${config.notifications.title}`);
                console.log(`  Desktop: ${config.notifications.desktop.enabled ? colors.green('Yes') : colors.dim('No')}`);
                console.log(`  Webhooks: ${config.notifications.webhooks.length}`);
                console.log();

                console.log(colors.dim(`Environment variables TARGET_IP_RANGES, EXCLUDE_IP_RANGES and MONITOR_INTERVAL override the file.`));
                console.log(colors.dim(`Use ${colors.cyan('rangewatch config --json')} for full output.`));
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
