/**
 * Rangewatch Configuration Module
 *
 * Handles loading and managing configuration from .rangewatch/config.yaml,
 * with environment variables layered on top.
 *
 * Precedence (lowest first):
 * - Built-in defaults
 * - .rangewatch/config.yaml
 * - .env in the working directory
 * - TARGET_IP_RANGES, EXCLUDE_IP_RANGES, MONITOR_INTERVAL from the process environment
 * - Command-line flags (applied by the watch command)
 */

import { readFile, writeFile, mkdir, access, constants } from 'node:fs/promises';
import { join } from 'node:path';
import yaml from 'yaml';
import dotenv from 'dotenv';
import { RangeSet } from './core/ranges.js';
import { ConfigError, type RangeParseError } from './core/errors.js';
import { type NotifyUrgency } from './core/desktop.js';
import { type WebhookConfig } from './core/webhooks.js';

/** Configuration directory name */
export const CONFIG_DIR = '.rangewatch';

/** Configuration filename */
export const CONFIG_FILENAME = 'config.yaml';

/** Environment file read from the working directory */
export const ENV_FILENAME = '.env';

/** Private address space */
export const DEFAULT_TARGET_RANGES = ['10.0.0.0/8', '172.16.0.0/12', '192.168.0.0/16'];

/** Typical home router management address */
export const DEFAULT_EXCLUDE_RANGES = ['192.168.1.1/32'];

/** Seconds between cycles */
export const DEFAULT_INTERVAL_SECONDS = 2;

/**
 * Environment variables recognised by loadConfig
 */
export const ENV_VARS = {
    targets: 'TARGET_IP_RANGES',
    excludes: 'EXCLUDE_IP_RANGES',
    interval: 'MONITOR_INTERVAL',
} as const;

/**
 * Desktop notification settings
 */
export interface DesktopConfig {
    /** Whether notify-send is used */
    enabled: boolean;
    /** notify-send urgency */
    urgency: NotifyUrgency;
    /** Icon name passed to notify-send */
    icon: string;
}

/**
 * Complete Rangewatch configuration
 */
export interface RangewatchConfig {
    /** Configuration file format version */
    version: string;
    /** CIDR blocks whose connections raise alerts */
    targetRanges: string[];
    /** CIDR blocks never alerted on, even inside a target */
    excludeRanges: string[];
    /** Seconds between cycles */
    intervalSeconds: number;
    /** Notification settings */
    notifications: {
        /** Title of every alert */
        title: string;
        desktop: DesktopConfig;
        webhooks: WebhookConfig[];
    };
}

/**
 * Settings the monitor runs with, after parsing and validation
 */
export interface MonitorSettings {
    targets: RangeSet;
    excludes: RangeSet;
    intervalMs: number;
    /** Entries that were skipped */
    warnings: RangeParseError[];
}

/**
 * Creates a default configuration object
 */
export function createDefaultConfig(): RangewatchConfig {
    return {
        version: '1',
        targetRanges: [...DEFAULT_TARGET_RANGES],
        excludeRanges: [...DEFAULT_EXCLUDE_RANGES],
        intervalSeconds: DEFAULT_INTERVAL_SECONDS,
        notifications: {
            title: 'Rangewatch Alert',
            desktop: {
                enabled: true,
                urgency: 'critical',
                icon: 'dialog-warning',
            },
            webhooks: [],
        },
    };
}

/**
 * Gets the path to the config directory
 */
export function getConfigDir(workDir: string = process.cwd()): string {
    return join(workDir, CONFIG_DIR);
}

/**
 * Gets the path to the config file
 */
export function getConfigPath(workDir: string = process.cwd()): string {
    return join(getConfigDir(workDir), CONFIG_FILENAME);
}

/**
 * Checks if a config file exists in the given directory
 */
export async function isInitialized(workDir: string = process.cwd()): Promise<boolean> {
    try {
        await access(getConfigPath(workDir), constants.F_OK);
        return true;
    } catch {
        return false;
    }
}

/**
 * Normalises a range list read from YAML: a list, or a single comma-separated string
 */
function toRangeList(value: unknown, fallback: string[]): string[] {
    if (typeof value === 'string') {
        return value.split(',').map(s => s.trim()).filter(Boolean);
    }
    if (Array.isArray(value)) {
        return value.map(v => String(v).trim()).filter(Boolean);
    }
    return fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merges a parsed YAML document over the defaults
 */
export function mergeConfig(loaded: unknown): RangewatchConfig {
    const defaults = createDefaultConfig();
    if (!isRecord(loaded)) {
        return defaults;
    }

    const notifications: Record<string, unknown> = isRecord(loaded.notifications) ? loaded.notifications : {};
    const desktop: Record<string, unknown> = isRecord(notifications.desktop) ? notifications.desktop : {};

    return {
        version: typeof loaded.version === 'string' ? loaded.version : defaults.version,
        targetRanges: toRangeList(loaded.targetRanges, defaults.targetRanges),
        excludeRanges: toRangeList(loaded.excludeRanges, defaults.excludeRanges),
        intervalSeconds: typeof loaded.intervalSeconds === 'number' || typeof loaded.intervalSeconds === 'string'
            ? parseInterval(loaded.intervalSeconds)
            : defaults.intervalSeconds,
        notifications: {
            title: typeof notifications.title === 'string' ? notifications.title : defaults.notifications.title,
            desktop: {
                enabled: typeof desktop.enabled === 'boolean' ? desktop.enabled : defaults.notifications.desktop.enabled,
                urgency: isUrgency(desktop.urgency) ? desktop.urgency : defaults.notifications.desktop.urgency,
                icon: typeof desktop.icon === 'string' ? desktop.icon : defaults.notifications.desktop.icon,
            },
            webhooks: Array.isArray(notifications.webhooks)
                ? notifications.webhooks.filter(isRecord).map(toWebhookConfig)
                : defaults.notifications.webhooks,
        },
    };
}

function isUrgency(value: unknown): value is NotifyUrgency {
    return value === 'low' || value === 'normal' || value === 'critical';
}

function toWebhookConfig(raw: Record<string, unknown>, index: number): WebhookConfig {
    const format = raw.format === 'slack' || raw.format === 'discord' ? raw.format : 'json';
    const headers = isRecord(raw.headers)
        ? Object.fromEntries(Object.entries(raw.headers).map(([k, v]) => [k, String(v)]))
        : undefined;

    return {
        name: typeof raw.name === 'string' ? raw.name : `webhook-${index + 1}`,
        url: typeof raw.url === 'string' ? raw.url : '',
        format,
        enabled: raw.enabled !== false,
        headers,
        secret: typeof raw.secret === 'string' ? raw.secret : undefined,
    };
}

/**
 * Applies TARGET_IP_RANGES, EXCLUDE_IP_RANGES and MONITOR_INTERVAL.
 * Unset variables leave the config untouched; a set but empty range
 * variable replaces the list with nothing.
 *
 * @throws ConfigError if MONITOR_INTERVAL is not a positive whole number
 */
export function applyEnvOverrides(
    config: RangewatchConfig,
    env: NodeJS.ProcessEnv = process.env
): RangewatchConfig {
    const targets = env[ENV_VARS.targets];
    const excludes = env[ENV_VARS.excludes];
    const interval = env[ENV_VARS.interval];

    return {
        ...config,
        targetRanges: targets !== undefined ? toRangeList(targets, []) : config.targetRanges,
        excludeRanges: excludes !== undefined ? toRangeList(excludes, []) : config.excludeRanges,
        intervalSeconds: interval !== undefined ? parseInterval(interval) : config.intervalSeconds,
    };
}

/**
 * Loads the configuration file, without environment overrides
 *
 * @param workDir - Working directory (defaults to cwd)
 * @returns The loaded configuration, or default if not found
 */
export async function loadConfigFile(workDir: string = process.cwd()): Promise<RangewatchConfig> {
    const configPath = getConfigPath(workDir);

    try {
        const content = await readFile(configPath, 'utf8');
        return mergeConfig(yaml.parse(content));
    } catch (err) {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
            return createDefaultConfig();
        }
        throw err;
    }
}

/**
 * Reads variables from the working directory's .env file.
 * A missing file yields no variables.
 */
export async function loadEnvFile(workDir: string = process.cwd()): Promise<Record<string, string>> {
    try {
        return dotenv.parse(await readFile(join(workDir, ENV_FILENAME), 'utf8'));
    } catch (err) {
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
            return {};
        }
        throw err;
    }
}

/**
 * Loads the effective configuration: file, then .env, then environment.
 * Variables set in the environment win over the .env file.
 */
export async function loadConfig(
    workDir: string = process.cwd(),
    env: NodeJS.ProcessEnv = process.env
): Promise<RangewatchConfig> {
    const fromFile = await loadEnvFile(workDir);
    return applyEnvOverrides(await loadConfigFile(workDir), { ...fromFile, ...env });
}

/**
 * Saves the configuration
 *
 * @param config - Configuration to save
 * @param workDir - Working directory (defaults to cwd)
 */
export async function saveConfig(
    config: RangewatchConfig,
    workDir: string = process.cwd()
): Promise<void> {
    const configPath = getConfigPath(workDir);
    const configDir = getConfigDir(workDir);

    // Ensure directory exists
    await mkdir(configDir, { recursive: true });

    const content = yaml.stringify(config, {
        indent: 2,
        sortMapEntries: false,
    });

    await writeFile(configPath, content, 'utf8');
}

/**
 * Writes a default configuration file
 *
 * @returns The created configuration
 */
export async function initConfig(workDir: string = process.cwd()): Promise<RangewatchConfig> {
    if (await isInitialized(workDir)) {
        throw new Error(`Already initialized. Delete ${CONFIG_DIR}/ to reinitialize.`);
    }

    const config = createDefaultConfig();
    await saveConfig(config, workDir);

    return config;
}

/**
 * Parses an interval in whole seconds
 *
 * @throws ConfigError unless the value is a positive integer
 */
export function parseInterval(value: number | string): number {
    const seconds = typeof value === 'number' ? value : Number(value.trim());
    const wellFormed = typeof value === 'number' || /^\d+$/.test(value.trim());

    if (!wellFormed || !Number.isInteger(seconds) || seconds <= 0) {
        throw new ConfigError(`Invalid monitor interval '${value}': expected a positive whole number of seconds`);
    }
    return seconds;
}

/**
 * Parses ranges and validates the interval
 *
 * @throws ConfigError when no target range survives parsing, or the interval is invalid
 */
export function resolveMonitorSettings(config: RangewatchConfig): MonitorSettings {
    const targets = RangeSet.fromSpecs(config.targetRanges);
    const excludes = RangeSet.fromSpecs(config.excludeRanges);

    if (targets.set.isEmpty()) {
        throw new ConfigError('No valid target IP ranges configured. Set TARGET_IP_RANGES or targetRanges.');
    }

    return {
        targets: targets.set,
        excludes: excludes.set,
        intervalMs: parseInterval(config.intervalSeconds) * 1000,
        warnings: [...targets.errors, ...excludes.errors],
    };
}
