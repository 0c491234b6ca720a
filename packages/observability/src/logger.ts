/**
 * Structured logging with Pino and OpenTelemetry trace correlation
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'verifier', 'authorization', 'credential'];

/**
 * Pino-backed logger shared by every package.
 * Adds the active trace context and redacts secrets in production.
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;
  private hasTransports = false;

  constructor(config?: ObservabilityConfig) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    // Keep test output quiet
    if (this.config.environment === 'test') {
      return pino({ level: 'silent' }, pino.destination('/dev/null'));
    }

    const level = this.config.environment === 'development' ? 'debug' : 'info';

    if (this.config.exporters.console) {
      this.hasTransports = true;
      return pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return pino({
      level,
      base: { service: this.config.service.name },
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object)
      }
    });
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags
      };
    }
    return logObject;
  }

  private sanitizeForProduction(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/Bot\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bot [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{40,}/g, '[TOKEN]');

    return { message: sanitizedMessage, data: sanitizeObject(data) };
  }

  // Pino formatters are unavailable with transports, so trace context is merged here instead
  private withTrace(data: unknown): object {
    const base: Record<string, unknown> = isRecord(data) ? data : data === undefined ? {} : { data };
    return this.hasTransports ? this.addTraceContext(base) : base;
  }

  debug(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.debug(this.withTrace(sanitized.data), sanitized.message);
  }

  info(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.info(this.withTrace(sanitized.data), sanitized.message);
  }

  warn(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.warn(this.withTrace(sanitized.data), sanitized.message);
  }

  error(message: string, error?: Error | unknown): void {
    const { message: sanitizedMessage } = this.sanitizeForProduction(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal server error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(this.withTrace(errorInfo), sanitizedMessage);
    } else {
      const { data } = this.sanitizeForProduction('', error);
      this.pino.error(this.withTrace(data), sanitizedMessage);
    }
  }

  oauthDebug(message: string, data?: unknown): void {
    this.debug(`[OAuth] ${message}`, data);
  }

  oauthInfo(message: string, data?: unknown): void {
    this.info(`[OAuth] ${message}`, data);
  }

  oauthWarn(message: string, data?: unknown): void {
    this.warn(`[OAuth] ${message}`, data);
  }

  oauthError(message: string, error?: Error | unknown): void {
    this.error(`[OAuth] ${message}`, error);
  }

  getPino(): pino.Logger {
    return this.pino;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replace values under sensitive keys with "[REDACTED]", recursively
 */
export function sanitizeObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
  if (typeof obj !== 'object' || obj === null) {
    return obj;
  }

  if (visited.has(obj)) {
    return '[Circular Reference]';
  }
  visited.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, visited));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeObject(value, visited);
    }
  }
  return sanitized;
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();
