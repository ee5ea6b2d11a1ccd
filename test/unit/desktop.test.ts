/**
 * Desktop Notifier Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DesktopNotifier } from '../../src/core/desktop.js';
import { DispatchError } from '../../src/core/errors.js';
import { type AlertNotification } from '../../src/core/dispatcher.js';

const notification: AlertNotification = {
    title: 'Rangewatch Alert',
    message: 'Connection detected to monitored range!',
    processName: 'curl',
    event: {
        key: '10.0.0.2:443',
        remoteAddress: '10.0.0.2',
        remotePort: 443,
        localPort: 51234,
        matchedRange: '10.0.0.0/8',
        timestamp: new Date(2026, 2, 1),
    },
};

describe('Desktop Notifier', () => {
    it('should call notify-send directly when not root', () => {
        const notifier = new DesktopNotifier({ runningAsRoot: false, env: { USER: 'alice' } });

        expect(notifier.buildCommand('Title', 'Body')).toEqual({
            file: 'notify-send',
            args: ['--urgency=critical', '--icon=dialog-warning', 'Title', 'Body'],
        });
    });

    it('should notify as the sudo user when running as root', () => {
        const notifier = new DesktopNotifier({
            runningAsRoot: true,
            env: { SUDO_USER: 'alice', USER: 'root' },
            urgency: 'normal',
        });

        expect(notifier.buildCommand('Title', 'Body')).toEqual({
            file: 'sudo',
            args: ['-u', 'alice', 'DISPLAY=:0', 'notify-send', '--urgency=normal', '--icon=dialog-warning', 'Title', 'Body'],
        });
    });

    it('should call notify-send directly for a root login without sudo', () => {
        const notifier = new DesktopNotifier({ runningAsRoot: true, env: { USER: 'root' } });

        expect(notifier.buildCommand('T', 'B').file).toBe('notify-send');
    });

    it('should run the built command', async () => {
        const runner = vi.fn().mockResolvedValue('');
        const notifier = new DesktopNotifier({ runningAsRoot: false, env: {}, icon: 'security-high', runner });

        await notifier.notify(notification);

        expect(runner).toHaveBeenCalledWith('notify-send', [
            '--urgency=critical',
            '--icon=security-high',
            'Rangewatch Alert',
            'Connection detected to monitored range!',
        ], { signal: undefined });
    });

    it('should hand the abort signal to the runner', async () => {
        const runner = vi.fn().mockResolvedValue('');
        const controller = new AbortController();
        const notifier = new DesktopNotifier({ runningAsRoot: false, env: {}, runner });

        await notifier.notify(notification, controller.signal);

        expect(runner).toHaveBeenCalledWith('notify-send', expect.any(Array), { signal: controller.signal });
    });

    it('should wrap runner failures in a DispatchError', async () => {
        const runner = vi.fn().mockRejectedValue(new Error('Command failed with exit code 1'));
        const notifier = new DesktopNotifier({ runningAsRoot: false, env: {}, runner });

        const failure = notifier.notify(notification);

        await expect(failure).rejects.toBeInstanceOf(DispatchError);
        await expect(failure).rejects.toThrow('desktop: Command failed with exit code 1');
    });
});
