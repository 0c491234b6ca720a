/**
 * Tests for MemoryLinkageStore
 */

import { MemoryLinkageStore } from '../../src/index.js';

describe('MemoryLinkageStore', () => {
  let store: MemoryLinkageStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00Z'));
    store = new MemoryLinkageStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns null for a requester without a linkage', async () => {
    expect(await store.getByRequester('42')).toBeNull();
  });

  it('creates a linkage stamped with the link time', async () => {
    const linkage = await store.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

    expect(linkage).toEqual({
      requesterId: '42',
      externalId: '900',
      externalDisplayName: 'nova',
      linkedAt: '2026-03-01T12:00:00.000Z'
    });
    expect(await store.getByRequester('42')).toEqual(linkage);
  });

  it('keeps one linkage per requester across repeated upserts', async () => {
    await store.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });
    vi.setSystemTime(new Date('2026-03-02T08:30:00Z'));
    await store.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

    expect(store.size).toBe(1);
    expect(await store.getByRequester('42')).toEqual({
      requesterId: '42',
      externalId: '900',
      externalDisplayName: 'nova',
      linkedAt: '2026-03-02T08:30:00.000Z'
    });
  });

  it('replaces the external identity on relink', async () => {
    await store.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });
    await store.upsert({ requesterId: '42', externalId: '901', externalDisplayName: 'vega' });

    expect((await store.getByRequester('42'))?.externalId).toBe('901');
  });

  it('reports whether a delete removed anything', async () => {
    await store.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

    expect(await store.delete('42')).toBe(true);
    expect(await store.delete('42')).toBe(false);
    expect(await store.getByRequester('42')).toBeNull();
  });
});
