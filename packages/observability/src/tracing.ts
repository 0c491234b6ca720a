/**
 * Distributed tracing helpers for link operations
 */

import { trace, SpanStatusCode } from '@opentelemetry/api';
import { getObservabilityConfig } from './config.js';

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Run an operation inside an active span named `link.<operation>`.
 * The span records the thrown error and is always ended.
 */
export function withLinkSpan<T>(
  operation: string,
  callback: () => Promise<T> | T
): Promise<T> {
  const config = getObservabilityConfig();

  if (!config.enabled) {
    return Promise.resolve().then(callback);
  }

  const tracer = trace.getTracer('account-link', config.service.version);

  return tracer.startActiveSpan(`link.${operation}`, async (span) => {
    try {
      span.setAttributes({ 'link.operation': operation });
      const result = await callback();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error'
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Tag the active span, if any, with attributes learned mid-operation
 */
export function addAttributesToCurrentSpan(attributes: SpanAttributes): void {
  trace.getActiveSpan()?.setAttributes(attributes);
}
