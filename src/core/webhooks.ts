/**
 * Rangewatch Webhook Alerts Module
 *
 * Delivers alerts to configured webhook endpoints.
 * Supports Slack, Discord and generic JSON payloads.
 *
 * Features:
 * - Multiple webhook endpoints
 * - Payload formatting (Slack, Discord, JSON)
 * - Optional HMAC-SHA256 signature header
 * - Retry with exponential backoff
 * - Per-request timeout; delivery stops when the caller's signal aborts
 */

import { createHmac } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { type AlertNotification, type NotificationSink } from './dispatcher.js';
import { DispatchError } from './errors.js';

/**
 * Webhook payload format
 */
export type WebhookFormat = 'json' | 'slack' | 'discord';

/**
 * Webhook endpoint configuration
 */
export interface WebhookConfig {
    /** Display name */
    name: string;
    /** Webhook URL (must be HTTPS) */
    url: string;
    /** Payload format */
    format: WebhookFormat;
    /** Whether this webhook is enabled */
    enabled: boolean;
    /** Custom headers to include */
    headers?: Record<string, string>;
    /** Secret for HMAC signature (optional) */
    secret?: string;
}

/**
 * Webhook delivery result
 */
export interface WebhookDeliveryResult {
    webhook: string;
    success: boolean;
    statusCode?: number;
    error?: string;
    timestamp: string;
    retryCount: number;
}

export interface WebhookDeliveryOptions {
    /** Retries after the first attempt */
    maxRetries?: number;
    /** Delay before the first retry; doubles on every retry */
    retryDelayMs?: number;
    /** Host name reported in payloads */
    hostname?: string;
    /** Per-request timeout */
    timeoutMs?: number;
}

/**
 * Formats alert for Slack webhook
 */
function formatSlackPayload(notification: AlertNotification, hostname: string): object {
    const { event } = notification;
    return {
        attachments: [{
            color: '#dc2626',
            blocks: [
                {
                    type: 'section',
                    text: {
                        type: 'mrkdwn',
                        text: `🚨 *${notification.title}*\n${notification.message}`,
                    },
                },
                {
                    type: 'context',
                    elements: [
                        {
                            type: 'mrkdwn',
                            text: `*Host:* ${hostname} | *Local port:* ${event.localPort} | *Time:* ${event.timestamp.toISOString()}`,
                        },
                    ],
                },
            ],
        }],
    };
}

/**
 * Formats alert for Discord webhook
 */
function formatDiscordPayload(notification: AlertNotification, hostname: string): object {
    const { event } = notification;
    return {
        embeds: [{
            title: `🚨 ${notification.title}`,
            description: notification.message,
            color: 0xdc2626,
            fields: [
                { name: 'Target', value: event.key, inline: true },
                { name: 'Range', value: event.matchedRange, inline: true },
                { name: 'Process', value: notification.processName, inline: true },
                { name: 'Host', value: hostname, inline: false },
            ],
            timestamp: event.timestamp.toISOString(),
        }],
    };
}

/**
 * Formats alert as JSON payload
 */
function formatJsonPayload(notification: AlertNotification, hostname: string): object {
    const { event } = notification;
    return {
        source: 'rangewatch',
        version: '1.0',
        hostname,
        alert: {
            title: notification.title,
            message: notification.message,
            remoteAddress: event.remoteAddress,
            remotePort: event.remotePort,
            localPort: event.localPort,
            matchedRange: event.matchedRange,
            pid: event.pid ?? null,
            processName: notification.processName,
            timestamp: event.timestamp.toISOString(),
        },
    };
}

/**
 * Formats an alert for the specified webhook format
 */
export function formatWebhookPayload(
    notification: AlertNotification,
    format: WebhookFormat,
    hostname: string
): object {
    switch (format) {
        case 'slack':
            return formatSlackPayload(notification, hostname);
        case 'discord':
            return formatDiscordPayload(notification, hostname);
        case 'json':
        default:
            return formatJsonPayload(notification, hostname);
    }
}

/**
 * Computes HMAC signature for webhook payload
 */
export function computeSignature(payload: string, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Delivers an alert to a webhook endpoint
 */
export async function dispatchWebhook(
    webhook: WebhookConfig,
    notification: AlertNotification,
    options: WebhookDeliveryOptions = {},
    signal?: AbortSignal
): Promise<WebhookDeliveryResult> {
    const maxRetries = options.maxRetries ?? 3;
    const retryDelayMs = options.retryDelayMs ?? 1000;
    const hostname = options.hostname ?? 'localhost';
    const timeoutMs = options.timeoutMs ?? 10_000;

    const payload = formatWebhookPayload(notification, webhook.format, hostname);
    const payloadString = JSON.stringify(payload);

    // Build headers
    const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        'User-Agent': 'Rangewatch-Webhook/1.0',
        ...webhook.headers,
    };

    if (webhook.secret) {
        headers['X-Rangewatch-Signature'] = `sha256=${computeSignature(payloadString, webhook.secret)}`;
    }

    let lastError: string | undefined;
    let statusCode: number | undefined;
    let attempts = 0;

    for (let retry = 0; retry <= maxRetries; retry++) {
        if (signal?.aborted) {
            lastError = 'aborted';
            break;
        }
        attempts = retry;

        const timeout = AbortSignal.timeout(timeoutMs);
        try {
            const response = await fetch(webhook.url, {
                method: 'POST',
                headers,
                body: payloadString,
                signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
            });

            statusCode = response.status;

            if (response.ok) {
                return {
                    webhook: webhook.name,
                    success: true,
                    statusCode,
                    timestamp: new Date().toISOString(),
                    retryCount: retry,
                };
            }

            lastError = `HTTP ${response.status}: ${response.statusText}`;

            // Don't retry on 4xx errors (client error)
            if (response.status >= 400 && response.status < 500) {
                break;
            }
        } catch (err) {
            if (signal?.aborted) {
                lastError = 'aborted';
                break;
            }
            lastError = timeout.aborted
                ? `timed out after ${timeoutMs}ms`
                : err instanceof Error ? err.message : String(err);
        }

        // Exponential backoff: 1x, 2x, 4x the base delay
        if (retry < maxRetries) {
            try {
                await sleep(Math.pow(2, retry) * retryDelayMs, undefined, { signal });
            } catch (err) {
                if (!signal?.aborted) {
                    throw err;
                }
            }
        }
    }

    return {
        webhook: webhook.name,
        success: false,
        statusCode,
        error: lastError,
        timestamp: new Date().toISOString(),
        retryCount: attempts,
    };
}

/**
 * Validates a webhook URL
 */
export function validateWebhookUrl(url: string): { valid: boolean; error?: string } {
    try {
        const parsed = new URL(url);

        if (parsed.protocol !== 'https:') {
            return { valid: false, error: 'Webhook URL must use HTTPS' };
        }

        return { valid: true };
    } catch {
        return { valid: false, error: 'Invalid URL format' };
    }
}

/**
 * Notification sink that posts to every enabled webhook
 */
export class WebhookNotifier implements NotificationSink {
    readonly name = 'webhook';
    private readonly webhooks: WebhookConfig[];
    private readonly options: WebhookDeliveryOptions;

    constructor(webhooks: WebhookConfig[], options: WebhookDeliveryOptions = {}) {
        this.webhooks = webhooks.filter(w => w.enabled);
        this.options = options;
    }

    get size(): number {
        return this.webhooks.length;
    }

    async notify(notification: AlertNotification, signal?: AbortSignal): Promise<void> {
        const results = await Promise.all(
            this.webhooks.map(webhook => dispatchWebhook(webhook, notification, this.options, signal))
        );

        const failed = results.filter(r => !r.success);
        if (failed.length > 0) {
            const details = failed.map(r => `${r.webhook} (${r.error ?? 'unknown error'})`).join(', ');
            throw new DispatchError(this.name, `delivery failed for ${details}`);
        }
    }
}
