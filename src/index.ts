/**
 * rangewatch
 *
 * Watches the host's established connections and alerts the first time a
 * remote endpoint falls inside a target range (and outside every excluded one).
 *
 * @example
 * ```typescript
 * import { RangeSet, RangeMatcher, ConnectionMonitor, AlertDispatcher } from 'rangewatch';
 *
 * const { set: targets } = RangeSet.fromSpecs('10.0.0.0/8');
 * const monitor = new ConnectionMonitor({
 *     sampler,
 *     matcher: new RangeMatcher(targets),
 *     dispatcher: new AlertDispatcher({ processInfo }),
 *     intervalMs: 2000,
 * });
 * await monitor.run(controller.signal);
 * ```
 *
 * @packageDocumentation
 */

// Core engine
export { AddressRange, RangeSet, parseRange, parseRangeList, addressFamily, unmapAddress } from './core/ranges.js';
export type { AddressFamily, RangeListResult } from './core/ranges.js';
export { RangeMatcher, type Classification } from './core/matcher.js';
export { AlertStateTracker, type AlertEvent } from './core/tracker.js';
export { ConnectionMonitor, abortableSleep, type MonitorOptions, type Sleeper } from './core/monitor.js';
export { MonitorHooks, createMonitorHooks, type CycleReport, type StopReason } from './core/hooks.js';
export {
    endpointKey,
    sampleKey,
    isEstablished,
    UNKNOWN_PROCESS,
    type ConnectionSample,
    type ConnectionSampler,
    type ConnectionStatus,
    type EndpointKey,
    type ProcessInfo,
} from './core/connections.js';
export { RangeParseError, ConfigError, SamplingError, DispatchError } from './core/errors.js';

// Notifications
export {
    AlertDispatcher,
    formatAlertLog,
    formatAlertMessage,
    type AlertNotification,
    type NotificationSink,
    type DispatchResult,
} from './core/dispatcher.js';
export { DesktopNotifier, createDesktopNotifier } from './core/desktop.js';
export { WebhookNotifier, dispatchWebhook, formatWebhookPayload, type WebhookConfig } from './core/webhooks.js';

// Host collaborators
export { SsConnectionSampler, createConnectionSampler, parseSsOutput } from './monitors/connections.js';
export { ProcfsProcessInfo, createProcessInfo } from './monitors/processes.js';

// Configuration
export {
    loadConfig,
    createDefaultConfig,
    resolveMonitorSettings,
    type RangewatchConfig,
    type MonitorSettings,
} from './config.js';
