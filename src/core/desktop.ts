/**
 * Rangewatch Desktop Notifier
 *
 * Shows alerts through notify-send (libnotify).
 *
 * When the monitor runs as root via sudo, the notification is sent as the
 * invoking user so it reaches that user's desktop session.
 */

import { type AlertNotification, type NotificationSink } from './dispatcher.js';
import { DispatchError, errorMessage } from './errors.js';
import { type CommandRunner, runCommand, isRoot } from '../utils/exec.js';

/**
 * notify-send urgency level
 */
export type NotifyUrgency = 'low' | 'normal' | 'critical';

export interface DesktopNotifierOptions {
    urgency?: NotifyUrgency;
    icon?: string;
    /** Display used when notifying on behalf of the sudo user */
    display?: string;
    /** Environment to read SUDO_USER / USER from */
    env?: NodeJS.ProcessEnv;
    /** Overrides root detection */
    runningAsRoot?: boolean;
    runner?: CommandRunner;
}

/**
 * Command line for one notification
 */
export interface NotifyCommand {
    file: string;
    args: string[];
}

export class DesktopNotifier implements NotificationSink {
    readonly name = 'desktop';
    private readonly urgency: NotifyUrgency;
    private readonly icon: string;
    private readonly display: string;
    private readonly env: NodeJS.ProcessEnv;
    private readonly runningAsRoot: boolean;
    private readonly runner: CommandRunner;

    constructor(options: DesktopNotifierOptions = {}) {
        this.urgency = options.urgency ?? 'critical';
        this.icon = options.icon ?? 'dialog-warning';
        this.display = options.display ?? ':0';
        this.env = options.env ?? process.env;
        this.runningAsRoot = options.runningAsRoot ?? isRoot();
        this.runner = options.runner ?? runCommand;
    }

    /**
     * Builds the notify-send invocation, wrapped in sudo when needed
     */
    buildCommand(title: string, message: string): NotifyCommand {
        const notifyArgs = [
            `--urgency=${this.urgency}`,
            `--icon=${this.icon}`,
            title,
            message,
        ];

        const user = this.env.SUDO_USER ?? this.env.USER ?? 'root';
        if (this.runningAsRoot && user !== 'root') {
            return {
                file: 'sudo',
                args: ['-u', user, `DISPLAY=${this.display}`, 'notify-send', ...notifyArgs],
            };
        }

        return { file: 'notify-send', args: notifyArgs };
    }

    async notify(notification: AlertNotification, signal?: AbortSignal): Promise<void> {
        const { file, args } = this.buildCommand(notification.title, notification.message);
        try {
            await this.runner(file, args, { signal });
        } catch (err) {
            throw new DispatchError(this.name, errorMessage(err), { cause: err });
        }
    }
}

/**
 * Creates a desktop notifier
 */
export function createDesktopNotifier(options?: DesktopNotifierOptions): DesktopNotifier {
    return new DesktopNotifier(options);
}
