/**
 * @account-link/auth
 *
 * Account linking with OAuth 2.0 authorization code + PKCE, and role
 * reconciliation for linked accounts
 */

export { generateChallenge, generateState, deriveChallenge, type PkcePair } from './pkce.js';
export { buildAuthorizationUrl, type AuthorizationUrlParams } from './authorization-url.js';

export {
  LinkError,
  MissingParametersError,
  SessionInvalidOrExpiredError,
  TokenExchangeError,
  ProfileFetchError,
  LinkagePersistError,
  GroupMembershipCheckError,
  RoleApplicationError,
  PlatformApiError,
} from './errors.js';

export {
  IdentityProviderClient,
  expandGroupMembershipUrl,
  type IdentityProvider,
  type IdentityProviderClientConfig,
  type TokenSet,
  type ExternalProfile,
} from './identity-provider-client.js';

export type { MemberDirectory, RoleGrant, TenantMember } from './member-directory.js';
export { DiscordMemberDirectory } from './discord-member-directory.js';

export {
  RoleSynchronizer,
  ROLE_GRANT_REASON,
  emptyRoleSyncResult,
  type RoleSyncResult,
  type RoleSynchronizerDependencies,
} from './role-synchronizer.js';

export { AccountLinkService, type BeginLinkResult, type AccountLinkServiceDependencies } from './link-service.js';
export {
  LinkCallbackHandler,
  UNKNOWN_REQUESTER_NAME,
  type LinkOutcome,
  type LinkCallbackHandlerDependencies,
} from './callback-handler.js';
