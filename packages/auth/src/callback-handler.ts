/**
 * Authorization callback handling
 *
 * consume session → exchange code → fetch profile → upsert linkage →
 * reconcile roles. Everything up to the upsert is fatal to the request;
 * role reconciliation never is.
 */

import { addAttributesToCurrentSpan, logger, recordLinkEvent, withLinkSpan } from '@account-link/observability';
import type { Linkage, LinkageStore, LinkSessionStore } from '@account-link/persistence';
import type { IdentityProvider } from './identity-provider-client.js';
import type { MemberDirectory } from './member-directory.js';
import { emptyRoleSyncResult, type RoleSyncResult, type RoleSynchronizer } from './role-synchronizer.js';
import {
  LinkagePersistError,
  LinkError,
  MissingParametersError,
  SessionInvalidOrExpiredError,
  errorMessage
} from './errors.js';

export const UNKNOWN_REQUESTER_NAME = 'Unknown';

export interface LinkOutcome {
  linkage: Linkage;
  /** External display name */
  displayName: string;
  /** Chat platform display name of the requester */
  requesterName: string;
  roleSync: RoleSyncResult;
}

export interface LinkCallbackHandlerDependencies {
  sessionStore: LinkSessionStore;
  linkageStore: LinkageStore;
  identityProvider: Pick<IdentityProvider, 'exchangeCode' | 'fetchProfile'>;
  roleSynchronizer: Pick<RoleSynchronizer, 'apply'>;
  memberDirectory: Pick<MemberDirectory, 'fetchUser'>;
}

export class LinkCallbackHandler {
  constructor(private readonly deps: LinkCallbackHandlerDependencies) {}

  handle(code?: string, state?: string): Promise<LinkOutcome> {
    const startedAt = Date.now();

    return withLinkSpan('callback', () => this.process(code, state)).then(
      (outcome) => {
        recordLinkEvent('completed', {}, Date.now() - startedAt);
        return outcome;
      },
      (error: unknown) => {
        recordLinkEvent('failed', { code: error instanceof LinkError ? error.code : 'internal' }, Date.now() - startedAt);
        throw error;
      }
    );
  }

  private async process(code?: string, state?: string): Promise<LinkOutcome> {
    if (!code || !state) {
      throw new MissingParametersError();
    }

    // Single use: the session is gone after this whatever happens next
    const session = await this.deps.sessionStore.consume(state);
    if (!session) {
      throw new SessionInvalidOrExpiredError();
    }
    const { requesterId } = session;
    addAttributesToCurrentSpan({ 'link.tenant_id': session.tenantId, 'link.requester_id': requesterId });

    const tokens = await this.deps.identityProvider.exchangeCode(code, session.codeVerifier);
    const profile = await this.deps.identityProvider.fetchProfile(tokens.accessToken);

    let linkage: Linkage;
    try {
      linkage = await this.deps.linkageStore.upsert({
        requesterId,
        externalId: profile.externalId,
        externalDisplayName: profile.displayName,
      });
    } catch (error) {
      throw new LinkagePersistError(`failed to store linkage: ${errorMessage(error)}`, error);
    }

    logger.oauthInfo('Account linked', {
      requesterId,
      externalId: profile.externalId,
      displayName: profile.displayName,
      tenantId: session.tenantId,
    });

    let roleSync: RoleSyncResult;
    try {
      roleSync = await this.deps.roleSynchronizer.apply(requesterId, profile.externalId, tokens.accessToken);
    } catch (error) {
      logger.error('Role reconciliation failed', error);
      roleSync = emptyRoleSyncResult();
    }
    if (Object.keys(roleSync.errorsPerTenant).length > 0) {
      recordLinkEvent('role_errors');
    }

    return {
      linkage,
      displayName: profile.displayName,
      requesterName: await this.resolveRequesterName(requesterId),
      roleSync,
    };
  }

  private async resolveRequesterName(requesterId: string): Promise<string> {
    try {
      return (await this.deps.memberDirectory.fetchUser(requesterId)) ?? UNKNOWN_REQUESTER_NAME;
    } catch (error) {
      logger.warn('Could not resolve requester name', { requesterId, error: errorMessage(error) });
      return UNKNOWN_REQUESTER_NAME;
    }
  }
}
