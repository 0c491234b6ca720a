/**
 * Tests for the pino-backed logger
 */

import { ObservabilityLogger, sanitizeObject, getLogger } from '../src/logger.js';
import type { ObservabilityConfig } from '../src/config.js';

function configFor(environment: ObservabilityConfig['environment']): ObservabilityConfig {
  return {
    enabled: environment !== 'test',
    environment,
    sampling: { metrics: false },
    exporters: { console: false },
    service: { name: 'test-service', version: '1.0.0' }
  };
}

describe('sanitizeObject', () => {
  it('redacts sensitive keys recursively', () => {
    const result = sanitizeObject({
      requesterId: '42',
      accessToken: 'tok1',
      nested: { codeVerifier: 'abc', tenantId: '7' },
      list: [{ clientSecret: 'test-secret' }]
    });

    expect(result).toEqual({
      requesterId: '42',
      accessToken: '[REDACTED]',
      nested: { codeVerifier: '[REDACTED]', tenantId: '7' },
      list: [{ clientSecret: '[REDACTED]' }]
    });
  });

  it('marks circular references', () => {
    const node: Record<string, unknown> = { name: 'root' };
    node.self = node;

    expect(sanitizeObject(node)).toEqual({ name: 'root', self: '[Circular Reference]' });
  });

  it('passes primitives through', () => {
    expect(sanitizeObject('plain')).toBe('plain');
    expect(sanitizeObject(undefined)).toBeUndefined();
  });
});

describe('ObservabilityLogger', () => {
  it('is silent under test', () => {
    const logger = new ObservabilityLogger(configFor('test'));

    expect(logger.getPino().level).toBe('silent');
  });

  it('logs at info level in production', () => {
    const logger = new ObservabilityLogger(configFor('production'));
    const info = vi.spyOn(logger.getPino(), 'info').mockImplementation(() => undefined);

    logger.oauthInfo('Token exchanged', { accessToken: 'tok1', requesterId: '42' });

    expect(logger.getPino().level).toBe('info');
    expect(info).toHaveBeenCalledWith({ accessToken: '[REDACTED]', requesterId: '42' }, '[OAuth] Token exchanged');
  });

  it('hides error messages in production', () => {
    const logger = new ObservabilityLogger(configFor('production'));
    const error = vi.spyOn(logger.getPino(), 'error').mockImplementation(() => undefined);

    logger.error('Callback failed', new TypeError('secret detail'));

    expect(error).toHaveBeenCalledWith({ name: 'TypeError', message: 'Internal server error' }, 'Callback failed');
  });

  it('returns a shared instance', () => {
    expect(getLogger()).toBe(getLogger());
  });
});
