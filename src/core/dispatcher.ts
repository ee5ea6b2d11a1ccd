/**
 * Rangewatch Alert Dispatcher
 *
 * Turns an alert event into a console record and a notification,
 * then hands the notification to every configured sink.
 *
 * A failing sink never stops the others, and never un-fires the alert.
 */

import { type AlertEvent } from './tracker.js';
import { type ProcessInfo, UNKNOWN_PROCESS } from './connections.js';
import { DispatchError, errorMessage } from './errors.js';
import { colors, warn } from '../utils/ui.js';

/** Default notification title */
export const DEFAULT_ALERT_TITLE = 'Rangewatch Alert';

/**
 * What a sink receives for one alert
 */
export interface AlertNotification {
    title: string;
    message: string;
    event: AlertEvent;
    processName: string;
}

/**
 * Delivers notifications somewhere outside the process
 */
export interface NotificationSink {
    /** Short name used in log messages */
    readonly name: string;
    /** Should settle promptly once the signal aborts */
    notify(notification: AlertNotification, signal?: AbortSignal): Promise<void>;
}

/**
 * Outcome of dispatching one alert
 */
export interface DispatchResult {
    notification: AlertNotification;
    /** Names of sinks that accepted the notification */
    delivered: string[];
    failures: DispatchError[];
}

export interface DispatcherOptions {
    processInfo: ProcessInfo;
    sinks?: NotificationSink[];
    title?: string;
    /** Receives the alert's console record, one entry per line */
    log?: (lines: string[]) => void;
    /** Called for each sink failure */
    onSinkError?: (err: DispatchError) => void;
}

function pad(value: number): string {
    return value.toString().padStart(2, '0');
}

/**
 * Formats a date as local YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Console record for an alert
 */
export function formatAlertLog(event: AlertEvent, processName: string): string[] {
    return [
        `[${formatTimestamp(event.timestamp)}] ALERT: Connection to ${event.key}`,
        `  Process: ${processName} (PID: ${event.pid ?? 'n/a'})`,
        `  Matched range: ${event.matchedRange}`,
        `  Local port: ${event.localPort}`,
    ];
}

/**
 * Notification body for an alert
 */
export function formatAlertMessage(event: AlertEvent, processName: string): string {
    return [
        'Connection detected to monitored range!',
        `Target: ${event.key}`,
        `Process: ${processName}`,
        `Range: ${event.matchedRange}`,
    ].join('\n');
}

function printAlert(lines: string[]): void {
    const [header, ...details] = lines;
    console.log(colors.red(header));
    for (const line of details) {
        console.log(line);
    }
    console.log();
}

export class AlertDispatcher {
    private readonly processInfo: ProcessInfo;
    private readonly sinks: NotificationSink[];
    private readonly title: string;
    private readonly log: (lines: string[]) => void;
    private readonly onSinkError: (err: DispatchError) => void;

    constructor(options: DispatcherOptions) {
        this.processInfo = options.processInfo;
        this.sinks = options.sinks ?? [];
        this.title = options.title ?? DEFAULT_ALERT_TITLE;
        this.log = options.log ?? printAlert;
        this.onSinkError = options.onSinkError ?? (err => warn(`Failed to send notification: ${err.message}`));
    }

    /**
     * Names of the configured sinks
     */
    getSinkNames(): string[] {
        return this.sinks.map(s => s.name);
    }

    /**
     * Logs the alert and hands it to every sink.
     * The signal is passed on so sinks can give up when monitoring stops.
     */
    async dispatch(event: AlertEvent, signal?: AbortSignal): Promise<DispatchResult> {
        const processName = event.pid !== undefined
            ? await this.processInfo.nameOf(event.pid)
            : UNKNOWN_PROCESS;

        this.log(formatAlertLog(event, processName));

        const notification: AlertNotification = {
            title: this.title,
            message: formatAlertMessage(event, processName),
            event,
            processName,
        };

        const delivered: string[] = [];
        const failures: DispatchError[] = [];

        for (const sink of this.sinks) {
            try {
                await sink.notify(notification, signal);
                delivered.push(sink.name);
            } catch (err) {
                const failure = err instanceof DispatchError
                    ? err
                    : new DispatchError(sink.name, errorMessage(err), { cause: err });
                failures.push(failure);
                this.onSinkError(failure);
            }
        }

        return { notification, delivered, failures };
    }
}
