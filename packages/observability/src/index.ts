/**
 * Observability exports: pino logger, tracing spans and metrics
 */

export { getObservabilityConfig, detectEnvironment, type ObservabilityConfig } from './config.js';
export { logger, getLogger, ObservabilityLogger, sanitizeObject, type LogLevel } from './logger.js';
export { withLinkSpan, addAttributesToCurrentSpan, type SpanAttributes } from './tracing.js';
export { initializeMetrics, recordLinkEvent, resetMetrics, type LinkEvent } from './metrics.js';
