import request from 'supertest';
import type { Mock } from 'vitest';
import type { MemberDirectory, TenantMember } from '@account-link/auth';
import { createLinkApplication, type LinkApplication } from '../src/index.js';
import { isolateLinkEnv } from '../../config/test/helpers/link-env.js';

describe('createLinkApplication', () => {
  const fetchMock = vi.fn<typeof fetch>();
  let originalFetch: typeof globalThis.fetch;
  let restoreEnv: () => void;
  let addRoles: Mock<MemberDirectory['addRoles']>;
  let application: LinkApplication;

  beforeAll(() => {
    originalFetch = globalThis.fetch;
    globalThis.fetch = fetchMock;
  });

  afterAll(() => {
    globalThis.fetch = originalFetch;
  });

  beforeEach(() => {
    restoreEnv = isolateLinkEnv({
      OAUTH_CLIENT_ID: 'test-client',
      OAUTH_CLIENT_SECRET: 'test-secret',
      SESSION_STORE_TYPE: 'memory',
      LINKAGE_STORE_TYPE: 'memory',
      TENANT_CONFIG: JSON.stringify({
        '0': { verifiedRoleId: '10' },
        '7': { externalGroupId: '55', groupMemberRoleId: '20' }
      })
    });
    fetchMock.mockReset();

    addRoles = vi.fn<MemberDirectory['addRoles']>()
      .mockImplementation(async (_tenantId, _userId, roleIds) => ({ granted: roleIds, unknown: [] }));
    application = createLinkApplication({
      memberDirectory: {
        fetchMember: async (_tenantId: string, userId: string): Promise<TenantMember> => ({ userId, roleIds: ['10'] }),
        addRoles,
        fetchUser: async () => 'Requester'
      }
    });
  });

  afterEach(async () => {
    await application.httpServer.stop();
    restoreEnv();
  });

  it('builds an authorization URL from the environment', async () => {
    const result = await application.linkService.beginLink('42', '7');

    expect(result.status).toBe('pending');
    if (result.status !== 'pending') {
      return;
    }
    const url = new URL(result.authorizationUrl);
    expect(`${url.origin}${url.pathname}`).toBe('https://apis.roblox.com/oauth/v1/authorize');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:5000/callback');
    expect(url.searchParams.get('scope')).toBe('openid profile group:read');
    expect(url.searchParams.get('state')).toBe(result.state);
    expect(result.expiresInSeconds).toBe(600);
  });

  it('completes a link started through the service', async () => {
    const started = await application.linkService.beginLink('42', '7');
    if (started.status !== 'pending') {
      throw new Error('expected a pending link');
    }
    fetchMock
      .mockResolvedValueOnce(Response.json({ access_token: 'tok1' }))
      .mockResolvedValueOnce(Response.json({ sub: '900', preferred_username: 'nova' }))
      .mockResolvedValueOnce(new Response(null, { status: 200 }));

    const response = await request(application.httpServer.getApp())
      .get(`/callback?code=xyz&state=${encodeURIComponent(started.state)}`)
      .expect(302);

    expect(response.headers.location).toBe('/success?success=true&rbx=nova&dc=Requester');
    expect(addRoles).toHaveBeenCalledWith('7', '42', ['20'], 'Account Verification');

    const again = await application.linkService.beginLink('42', '7');
    expect(again.status).toBe('already_linked');
    expect(await application.linkService.unlink('42')).toBe(true);
    expect(await application.linkService.getLinkage('42')).toBeNull();
  });

  it('reports the configured stores on the health endpoint', async () => {
    const response = await request(application.httpServer.getApp()).get('/health').expect(200);

    expect(response.body.storage).toEqual({ sessions: 'memory', linkages: 'memory' });
  });
});
