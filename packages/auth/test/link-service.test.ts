import { MemoryLinkSessionStore, MemoryLinkageStore } from '@account-link/persistence';
import { AccountLinkService, deriveChallenge } from '../src/index.js';

describe('AccountLinkService', () => {
  let sessionStore: MemoryLinkSessionStore;
  let linkageStore: MemoryLinkageStore;
  let service: AccountLinkService;

  beforeEach(() => {
    sessionStore = new MemoryLinkSessionStore();
    linkageStore = new MemoryLinkageStore();
    service = new AccountLinkService({
      sessionStore,
      linkageStore,
      provider: {
        authorizationUrl: 'https://idp.example.com/oauth/authorize',
        clientId: 'test-client',
        redirectUri: 'http://localhost:5000/callback',
        scopes: ['openid', 'profile']
      }
    });
  });

  afterEach(() => {
    sessionStore.dispose();
  });

  describe('beginLink', () => {
    it('creates a session and returns the authorize URL', async () => {
      const result = await service.beginLink('42', '7');
      if (result.status !== 'pending') {
        throw new Error(`unexpected status ${result.status}`);
      }

      expect(result.expiresInSeconds).toBe(600);
      expect(result.state).toHaveLength(22);

      const url = new URL(result.authorizationUrl);
      expect(url.origin + url.pathname).toBe('https://idp.example.com/oauth/authorize');
      expect(url.searchParams.get('client_id')).toBe('test-client');
      expect(url.searchParams.get('state')).toBe(result.state);
      expect(url.searchParams.get('scope')).toBe('openid profile');
      expect(url.searchParams.get('code_challenge_method')).toBe('S256');

      const session = await sessionStore.consume(result.state);
      expect(session?.requesterId).toBe('42');
      expect(session?.tenantId).toBe('7');
      expect(url.searchParams.get('code_challenge')).toBe(deriveChallenge(session?.codeVerifier ?? ''));
    });

    it('defaults the tenant to the platform-level id', async () => {
      const result = await service.beginLink('42');
      if (result.status !== 'pending') {
        throw new Error(`unexpected status ${result.status}`);
      }

      expect((await sessionStore.consume(result.state))?.tenantId).toBe('0');
    });

    it('issues a fresh state on every request', async () => {
      const first = await service.beginLink('42');
      const second = await service.beginLink('42');

      expect(first.status === 'pending' && second.status === 'pending' && first.state !== second.state).toBe(true);
      expect(sessionStore.size).toBe(2);
    });

    it('does not start a session for a linked requester', async () => {
      const linkage = await linkageStore.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

      const result = await service.beginLink('42', '7');

      expect(result).toEqual({ status: 'already_linked', linkage });
      expect(sessionStore.size).toBe(0);
    });
  });

  describe('unlink', () => {
    it('removes an existing linkage', async () => {
      await linkageStore.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

      expect(await service.unlink('42')).toBe(true);
      expect(await service.getLinkage('42')).toBeNull();
    });

    it('reports when there was nothing to unlink', async () => {
      expect(await service.unlink('42')).toBe(false);
    });
  });

  it('looks up a linkage', async () => {
    const linkage = await linkageStore.upsert({ requesterId: '42', externalId: '900', externalDisplayName: 'nova' });

    expect(await service.getLinkage('42')).toEqual(linkage);
  });
});
