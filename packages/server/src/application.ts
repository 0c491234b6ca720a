/**
 * Wires configuration, stores, clients and handlers into a runnable service
 */

import { EnvironmentConfig } from '@account-link/config';
import {
  AccountLinkService,
  DiscordMemberDirectory,
  IdentityProviderClient,
  LinkCallbackHandler,
  RoleSynchronizer,
  type MemberDirectory
} from '@account-link/auth';
import { LinkHttpServer } from '@account-link/http-server';
import { createLinkSessionStore, createLinkageStore } from '@account-link/persistence';
import { logger } from '@account-link/observability';

export interface LinkApplication {
  /** Operations the command layer calls: beginLink, unlink, getLinkage */
  linkService: AccountLinkService;
  callbackHandler: LinkCallbackHandler;
  httpServer: LinkHttpServer;
}

export interface LinkApplicationOverrides {
  /** Replaces the Discord REST directory */
  memberDirectory?: MemberDirectory;
}

/**
 * Build the application from the loaded environment configuration
 */
export function createLinkApplication(overrides: LinkApplicationOverrides = {}): LinkApplication {
  const providerConfig = EnvironmentConfig.getLinkProviderConfig();
  const storageConfig = EnvironmentConfig.getStorageConfig();
  const serverConfig = EnvironmentConfig.getServerConfig();
  const tenants = EnvironmentConfig.getTenantRoleConfigs();

  const storeOptions = { redisUrl: storageConfig.redisUrl, keyPrefix: storageConfig.keyPrefix };
  const sessionStore = createLinkSessionStore({ ...storeOptions, type: storageConfig.sessionStoreType });
  const linkageStore = createLinkageStore({ ...storeOptions, type: storageConfig.linkageStoreType });

  const identityProvider = new IdentityProviderClient(providerConfig);
  const memberDirectory = overrides.memberDirectory ?? new DiscordMemberDirectory(EnvironmentConfig.getPlatformConfig());

  const roleSynchronizer = new RoleSynchronizer({ tenants, identityProvider, memberDirectory });

  const linkService = new AccountLinkService({ sessionStore, linkageStore, provider: providerConfig });
  const callbackHandler = new LinkCallbackHandler({
    sessionStore,
    linkageStore,
    identityProvider,
    roleSynchronizer,
    memberDirectory,
  });

  const httpServer = new LinkHttpServer(callbackHandler, {
    port: serverConfig.port,
    host: serverConfig.host,
    successUrl: serverConfig.successUrl,
    storage: {
      sessions: storageConfig.sessionStoreType ?? (storageConfig.redisUrl ? 'redis' : 'memory'),
      linkages: storageConfig.linkageStoreType ?? (storageConfig.redisUrl ? 'redis' : 'memory'),
    },
    onStop: async () => {
      sessionStore.dispose();
      linkageStore.dispose();
      logger.debug('Stores disposed');
    },
  });

  return { linkService, callbackHandler, httpServer };
}
