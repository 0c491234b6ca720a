/**
 * Tests for MemoryLinkSessionStore
 */

import { MemoryLinkSessionStore } from '../../src/index.js';

const VERIFIER = 'test-verifier-'.padEnd(64, 'x');

describe('MemoryLinkSessionStore', () => {
  let store: MemoryLinkSessionStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    store = new MemoryLinkSessionStore();
  });

  afterEach(() => {
    store.dispose();
    vi.useRealTimers();
  });

  it('stores a session stamped with the creation time', async () => {
    const session = await store.create('state-1', { requesterId: '42', tenantId: '7', codeVerifier: VERIFIER });

    expect(session).toEqual({
      requesterId: '42',
      tenantId: '7',
      codeVerifier: VERIFIER,
      createdAt: Date.parse('2026-01-01T00:00:00Z')
    });
    expect(store.size).toBe(1);
  });

  it('rejects a session with an invalid verifier without storing it', async () => {
    await expect(
      store.create('state-1', { requesterId: '42', tenantId: '7', codeVerifier: 'short' })
    ).rejects.toThrow();

    expect(store.size).toBe(0);
    expect(await store.consume('state-1')).toBeNull();
  });

  it('rejects a session without a requester', async () => {
    await expect(
      store.create('state-1', { requesterId: '', tenantId: '7', codeVerifier: VERIFIER })
    ).rejects.toThrow();
  });

  it('hands a session out exactly once', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '7', codeVerifier: VERIFIER });

    const first = await store.consume('state-1');
    const second = await store.consume('state-1');

    expect(first?.requesterId).toBe('42');
    expect(second).toBeNull();
    expect(store.size).toBe(0);
  });

  it('lets only one of two concurrent consumers win', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '7', codeVerifier: VERIFIER });

    const results = await Promise.all([store.consume('state-1'), store.consume('state-1')]);

    expect(results.filter((result) => result !== null)).toHaveLength(1);
  });

  it('returns null for an unknown state', async () => {
    expect(await store.consume('never-issued')).toBeNull();
  });

  it('still returns the session just before expiry', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '0', codeVerifier: VERIFIER });

    vi.advanceTimersByTime(599_000);

    expect(await store.consume('state-1')).not.toBeNull();
  });

  it('treats a session consumed after its TTL as not found', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '0', codeVerifier: VERIFIER });

    vi.advanceTimersByTime(601_000);

    expect(await store.consume('state-1')).toBeNull();
  });

  it('honours a custom TTL', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '0', codeVerifier: VERIFIER }, 30);

    vi.setSystemTime(Date.now() + 31_000);

    expect(await store.consume('state-1')).toBeNull();
  });

  it('sweeps expired sessions on its interval', async () => {
    await store.create('short', { requesterId: '1', tenantId: '0', codeVerifier: VERIFIER }, 30);
    await store.create('long', { requesterId: '2', tenantId: '0', codeVerifier: VERIFIER });

    vi.advanceTimersByTime(60_000);

    expect(store.size).toBe(1);
    expect(await store.consume('long')).not.toBeNull();
  });

  it('clears everything on dispose', async () => {
    await store.create('state-1', { requesterId: '42', tenantId: '0', codeVerifier: VERIFIER });

    store.dispose();

    expect(store.size).toBe(0);
  });
});
