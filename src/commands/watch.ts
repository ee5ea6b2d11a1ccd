import { Command } from 'commander';
import { hostname } from 'node:os';
import { colors, info, warn, debug, printError, error, configureOutput } from '../utils/ui.js';
import {
    loadConfig,
    parseInterval,
    resolveMonitorSettings,
    type MonitorSettings,
    type RangewatchConfig,
} from '../config.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import { type ConnectionSampler, type ProcessInfo } from '../core/connections.js';
import { RangeMatcher } from '../core/matcher.js';
import { AlertDispatcher, type NotificationSink } from '../core/dispatcher.js';
import { createDesktopNotifier } from '../core/desktop.js';
import { WebhookNotifier, validateWebhookUrl } from '../core/webhooks.js';
import { ConnectionMonitor, type Sleeper } from '../core/monitor.js';
import { createMonitorHooks, type CycleReport } from '../core/hooks.js';
import { createConnectionSampler } from '../monitors/connections.js';
import { createProcessInfo } from '../monitors/processes.js';
import { commandExists, isRoot } from '../utils/exec.js';

/**
 * Flags accepted by the watch command
 */
export interface WatchOptions {
    targets?: string;
    exclude?: string;
    interval?: string;
    /** False when --no-desktop is given */
    desktop?: boolean;
}

/**
 * Collaborators used by runWatch; defaults talk to the real host
 */
export interface WatchDependencies {
    workDir?: string;
    env?: NodeJS.ProcessEnv;
    sampler?: ConnectionSampler;
    processInfo?: ProcessInfo;
    /** Replaces the sinks built from configuration */
    sinks?: NotificationSink[];
    runningAsRoot?: boolean;
    sleep?: Sleeper;
    signal?: AbortSignal;
}

/**
 * Applies command-line overrides on top of file and environment configuration
 */
export function applyCliOverrides(config: RangewatchConfig, options: WatchOptions): RangewatchConfig {
    const split = (value: string) => value.split(',').map(s => s.trim()).filter(Boolean);

    return {
        ...config,
        targetRanges: options.targets !== undefined ? split(options.targets) : config.targetRanges,
        excludeRanges: options.exclude !== undefined ? split(options.exclude) : config.excludeRanges,
        intervalSeconds: options.interval !== undefined ? parseInterval(options.interval) : config.intervalSeconds,
        notifications: {
            ...config.notifications,
            desktop: {
                ...config.notifications.desktop,
                enabled: options.desktop === false ? false : config.notifications.desktop.enabled,
            },
        },
    };
}

/**
 * Loads configuration and resolves monitor settings, printing skipped entries
 *
 * @returns Settings, or null after printing the reason monitoring cannot start
 */
export async function prepareSettings(
    options: WatchOptions,
    deps: Pick<WatchDependencies, 'workDir' | 'env'> = {}
): Promise<{ config: RangewatchConfig; settings: MonitorSettings } | null> {
    try {
        const config = applyCliOverrides(await loadConfig(deps.workDir, deps.env), options);
        const settings = resolveMonitorSettings(config);

        for (const warning of settings.warnings) {
            warn(`Warning: ${warning.message}`);
        }

        return { config, settings };
    } catch (err) {
        if (err instanceof ConfigError) {
            printError(err.message);
            return null;
        }
        throw err;
    }
}

/**
 * Builds notification sinks from configuration
 */
async function buildSinks(config: RangewatchConfig, runningAsRoot: boolean): Promise<NotificationSink[]> {
    const sinks: NotificationSink[] = [];
    const { desktop, webhooks } = config.notifications;

    if (desktop.enabled) {
        if (await commandExists('notify-send')) {
            sinks.push(createDesktopNotifier({
                urgency: desktop.urgency,
                icon: desktop.icon,
                runningAsRoot,
            }));
        } else {
            warn('notify-send not found. Install libnotify to get desktop notifications.');
        }
    }

    const usable = webhooks.filter(webhook => {
        if (!webhook.enabled) return false;
        const check = validateWebhookUrl(webhook.url);
        if (!check.valid) {
            warn(`Skipping webhook "${webhook.name}": ${check.error}`);
        }
        return check.valid;
    });
    if (usable.length > 0) {
        sinks.push(new WebhookNotifier(usable, { hostname: hostname() }));
    }

    return sinks;
}

function describeCycle(report: CycleReport): string {
    return `[cycle ${report.cycle}] ${report.observed} established, ${report.targeted} targeted, `
        + `${report.excluded} excluded, ${report.alerts.length} new alert(s), `
        + `${report.forgotten.length} forgotten, ${report.remembered} remembered`;
}

/**
 * Runs the monitor until the signal aborts
 *
 * @returns Process exit code
 */
export async function runWatch(options: WatchOptions, deps: WatchDependencies = {}): Promise<number> {
    const prepared = await prepareSettings(options, deps);
    if (!prepared) {
        return 1;
    }
    const { config, settings } = prepared;

    const runningAsRoot = deps.runningAsRoot ?? isRoot();
    if (!runningAsRoot) {
        warn('Running without root privileges. Process details of other users\' connections will be missing.');
    }

    const sinks = deps.sinks ?? await buildSinks(config, runningAsRoot);
    const dispatcher = new AlertDispatcher({
        processInfo: deps.processInfo ?? createProcessInfo(),
        sinks,
        title: config.notifications.title,
    });

    const hooks = createMonitorHooks();
    hooks.on('cycle', report => {
        if (report.skipped) {
            warn(`${report.skipped}; skipping cycle ${report.cycle}`);
            return;
        }
        debug(describeCycle(report));
    });

    const monitor = new ConnectionMonitor({
        sampler: deps.sampler ?? createConnectionSampler(),
        matcher: new RangeMatcher(settings.targets, settings.excludes),
        dispatcher,
        intervalMs: settings.intervalMs,
        hooks,
        sleep: deps.sleep,
    });

    info(`Starting network monitor at ${new Date().toLocaleString()}`);
    info(`Monitoring connections to: ${colors.cyan(settings.targets.labels().join(', '))}`);
    if (settings.excludes.isEmpty()) {
        info('No IP ranges excluded from monitoring');
    } else {
        info(`Excluding connections to: ${colors.cyan(settings.excludes.labels().join(', '))}`);
    }
    debug(`Interval: ${settings.intervalMs / 1000}s, notifications: ${dispatcher.getSinkNames().join(', ') || 'console only'}`);
    info('Press Ctrl+C to stop\n');

    const signal = deps.signal ?? new AbortController().signal;
    try {
        await monitor.run(signal);
    } catch (err) {
        printError(`Error during monitoring: ${errorMessage(err)}`);
        return 1;
    }

    info('Stopping network monitor...');
    return 0;
}

export function registerWatchCommand(program: Command) {
    /**
     * Watch Command
     * Polls the connection table and alerts on targeted endpoints
     */
    program
        .command('watch', { isDefault: true })
        .description('Watch established connections and alert on targeted ranges')
        .option('-t, --targets <ranges>', 'Comma-separated target CIDR list (overrides TARGET_IP_RANGES)')
        .option('-x, --exclude <ranges>', 'Comma-separated excluded CIDR list (overrides EXCLUDE_IP_RANGES)')
        .option('-i, --interval <seconds>', 'Seconds between samples (overrides MONITOR_INTERVAL)')
        .option('--no-desktop', 'Disable desktop notifications')
        .action(async (options: WatchOptions) => {
            const opts = program.opts();
            configureOutput({ quiet: opts.quiet ?? false, verbose: opts.verbose ?? false });

            // Registered for the whole run: a repeated signal only re-aborts
            const controller = new AbortController();
            const stop = () => controller.abort();
            process.on('SIGINT', stop);
            process.on('SIGTERM', stop);

            try {
                const exitCode = await runWatch(options, { signal: controller.signal });
                process.exit(exitCode);
            } catch (err) {
                error(errorMessage(err));
            } finally {
                process.removeListener('SIGINT', stop);
                process.removeListener('SIGTERM', stop);
            }
        });
}
