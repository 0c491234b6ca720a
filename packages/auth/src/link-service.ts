/**
 * Operations a command layer calls to start, inspect and remove a link
 */

import type { LinkProviderConfig } from '@account-link/config';
import { DEFAULT_TENANT_ID } from '@account-link/config';
import { logger, recordLinkEvent } from '@account-link/observability';
import {
  LINK_SESSION_TTL_SECONDS,
  type Linkage,
  type LinkageStore,
  type LinkSessionStore
} from '@account-link/persistence';
import { generateChallenge, generateState } from './pkce.js';
import { buildAuthorizationUrl } from './authorization-url.js';

export type BeginLinkResult =
  | { status: 'already_linked'; linkage: Linkage }
  | { status: 'pending'; state: string; authorizationUrl: string; expiresInSeconds: number };

export interface AccountLinkServiceDependencies {
  sessionStore: LinkSessionStore;
  linkageStore: LinkageStore;
  provider: Pick<LinkProviderConfig, 'authorizationUrl' | 'clientId' | 'redirectUri' | 'scopes'>;
  sessionTtlSeconds?: number;
}

export class AccountLinkService {
  private readonly sessionTtlSeconds: number;

  constructor(private readonly deps: AccountLinkServiceDependencies) {
    this.sessionTtlSeconds = deps.sessionTtlSeconds ?? LINK_SESSION_TTL_SECONDS;
  }

  /**
   * Start linking, unless the requester is already linked
   */
  async beginLink(requesterId: string, tenantId: string = DEFAULT_TENANT_ID): Promise<BeginLinkResult> {
    const existing = await this.deps.linkageStore.getByRequester(requesterId);
    if (existing) {
      recordLinkEvent('already_linked');
      return { status: 'already_linked', linkage: existing };
    }

    const state = generateState();
    const { verifier, challenge } = generateChallenge();

    await this.deps.sessionStore.create(state, { requesterId, tenantId, codeVerifier: verifier }, this.sessionTtlSeconds);

    const authorizationUrl = buildAuthorizationUrl({
      authorizationUrl: this.deps.provider.authorizationUrl,
      clientId: this.deps.provider.clientId,
      redirectUri: this.deps.provider.redirectUri,
      scopes: this.deps.provider.scopes,
      challenge,
      state,
    });

    logger.oauthInfo('Link started', { requesterId, tenantId });
    recordLinkEvent('started', { tenant: tenantId });

    return { status: 'pending', state, authorizationUrl, expiresInSeconds: this.sessionTtlSeconds };
  }

  /**
   * @returns false when the requester was not linked
   */
  async unlink(requesterId: string): Promise<boolean> {
    const removed = await this.deps.linkageStore.delete(requesterId);
    if (removed) {
      logger.info('Account unlinked', { requesterId });
      recordLinkEvent('unlinked');
    }
    return removed;
  }

  getLinkage(requesterId: string): Promise<Linkage | null> {
    return this.deps.linkageStore.getByRequester(requesterId);
  }
}
