/**
 * Tests for link tracing helpers
 */

const mocks = vi.hoisted(() => {
  const span = {
    setAttributes: vi.fn(),
    setStatus: vi.fn(),
    recordException: vi.fn(),
    end: vi.fn(),
    spanContext: vi.fn(() => ({ traceId: 'test-trace-id', spanId: 'test-span-id' }))
  };
  const tracer = {
    startActiveSpan: vi.fn((_name: string, callback: (activeSpan: typeof span) => unknown) => callback(span))
  };
  return {
    span,
    tracer,
    getTracer: vi.fn(() => tracer),
    getActiveSpan: vi.fn((): typeof span | undefined => span),
    getObservabilityConfig: vi.fn()
  };
});

vi.mock('@opentelemetry/api', () => ({
  trace: {
    getTracer: mocks.getTracer,
    getActiveSpan: mocks.getActiveSpan
  },
  SpanStatusCode: {
    OK: 1,
    ERROR: 2
  }
}));

vi.mock('../src/config.js', () => ({
  getObservabilityConfig: mocks.getObservabilityConfig
}));

import { withLinkSpan, addAttributesToCurrentSpan } from '../src/tracing.js';

describe('withLinkSpan', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.getObservabilityConfig.mockReturnValue({
      enabled: true,
      environment: 'development',
      service: { name: 'test-service', version: '2.0.0' }
    });
  });

  it('bypasses tracing when disabled', async () => {
    mocks.getObservabilityConfig.mockReturnValue({ enabled: false, service: { version: '2.0.0' } });

    const result = await withLinkSpan('callback', () => 'plain');

    expect(result).toBe('plain');
    expect(mocks.getTracer).not.toHaveBeenCalled();
  });

  it('turns a synchronous throw into a rejection when disabled', async () => {
    mocks.getObservabilityConfig.mockReturnValue({ enabled: false, service: { version: '2.0.0' } });

    await expect(withLinkSpan('callback', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });

  it('wraps the operation in a named span', async () => {
    const result = await withLinkSpan('callback', async () => 'done');

    expect(result).toBe('done');
    expect(mocks.getTracer).toHaveBeenCalledWith('account-link', '2.0.0');
    expect(mocks.tracer.startActiveSpan).toHaveBeenCalledWith('link.callback', expect.any(Function));
    expect(mocks.span.setAttributes).toHaveBeenCalledWith({ 'link.operation': 'callback' });
    expect(mocks.span.setStatus).toHaveBeenCalledWith({ code: 1 });
    expect(mocks.span.end).toHaveBeenCalledTimes(1);
  });

  it('records the exception and rethrows', async () => {
    const failure = new Error('exchange failed');

    await expect(withLinkSpan('exchange', async () => {
      throw failure;
    })).rejects.toBe(failure);

    expect(mocks.span.recordException).toHaveBeenCalledWith(failure);
    expect(mocks.span.setStatus).toHaveBeenCalledWith({ code: 2, message: 'exchange failed' });
    expect(mocks.span.end).toHaveBeenCalledTimes(1);
  });
});

describe('addAttributesToCurrentSpan', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('adds attributes to the active span', () => {
    addAttributesToCurrentSpan({ 'link.status': 'pending' });

    expect(mocks.span.setAttributes).toHaveBeenCalledWith({ 'link.status': 'pending' });
  });

  it('does nothing without an active span', () => {
    mocks.getActiveSpan.mockReturnValueOnce(undefined);

    expect(() => addAttributesToCurrentSpan({ 'link.status': 'pending' })).not.toThrow();
    expect(mocks.span.setAttributes).not.toHaveBeenCalled();
  });
});
