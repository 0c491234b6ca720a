/**
 * Link flow metrics
 */

import { metrics, type Counter, type Histogram } from '@opentelemetry/api';
import { getObservabilityConfig } from './config.js';

export type LinkEvent =
  | 'started'
  | 'already_linked'
  | 'completed'
  | 'failed'
  | 'unlinked'
  | 'roles_applied'
  | 'role_errors';

let linkEventCounter: Counter | undefined;
let linkDuration: Histogram | undefined;

/**
 * Create the metric instruments.
 * Without a registered MeterProvider the API hands back no-op instruments.
 */
export function initializeMetrics(): void {
  const config = getObservabilityConfig();

  if (!config.enabled || !config.sampling.metrics) {
    return;
  }

  const meter = metrics.getMeter('account-link', config.service.version);

  linkEventCounter = meter.createCounter('link_events_total', {
    description: 'Total number of account link events'
  });

  linkDuration = meter.createHistogram('link_callback_duration_ms', {
    description: 'Duration of link callback handling in milliseconds'
  });
}

/**
 * Record a link lifecycle event, with the callback duration when it completes
 */
export function recordLinkEvent(event: LinkEvent, attributes: Record<string, string> = {}, durationMs?: number): void {
  if (!linkEventCounter) {
    return;
  }

  linkEventCounter.add(1, { event, ...attributes });

  if (durationMs !== undefined && linkDuration && (event === 'completed' || event === 'failed')) {
    linkDuration.record(durationMs, { event });
  }
}

/**
 * Drop the instruments (used by tests)
 */
export function resetMetrics(): void {
  linkEventCounter = undefined;
  linkDuration = undefined;
}
