/**
 * Logger interface for persistence package
 *
 * Allows optional logging injection from the consuming application.
 * If no logger is provided, operations are silent (no-op).
 */

export interface PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void;
  warn(_message: string, _meta?: Record<string, unknown>): void;
  error(_message: string, _meta?: Record<string, unknown>): void;
  debug(_message: string, _meta?: Record<string, unknown>): void;
  // Optional OAuth-specific logging methods
  oauthDebug?(_message: string, _meta?: Record<string, unknown>): void;
  oauthWarn?(_message: string, _meta?: Record<string, unknown>): void;
}

class NoOpLogger implements PersistenceLogger {
  info(): void {
    // No-op
  }

  warn(): void {
    // No-op
  }

  error(): void {
    // No-op
  }

  debug(): void {
    // No-op
  }
}

let loggerInstance: PersistenceLogger = new NoOpLogger();

/**
 * Set the logger implementation
 */
export function setLogger(logger: PersistenceLogger): void {
  loggerInstance = logger;
}

/**
 * Delegates to the current logger instance, falling back to the plain
 * levels when the injected logger has no OAuth helpers
 */
export const logger: Required<PersistenceLogger> = {
  info: (message, meta) => loggerInstance.info(message, meta),
  warn: (message, meta) => loggerInstance.warn(message, meta),
  error: (message, meta) => loggerInstance.error(message, meta),
  debug: (message, meta) => loggerInstance.debug(message, meta),
  oauthDebug: (message, meta) =>
    loggerInstance.oauthDebug ? loggerInstance.oauthDebug(message, meta) : loggerInstance.debug(message, meta),
  oauthWarn: (message, meta) =>
    loggerInstance.oauthWarn ? loggerInstance.oauthWarn(message, meta) : loggerInstance.warn(message, meta),
};

/**
 * Shorten a secret-bearing key (state, verifier) for log output
 */
export function prefixOf(value: string, length = 8): string {
  return `${value.substring(0, length)}...`;
}
