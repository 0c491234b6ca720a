/**
 * Identity provider client
 *
 * The three outbound calls of a link: code exchange, profile lookup and
 * group membership. Each call carries the configured timeout; nothing is
 * retried.
 */

import { z } from 'zod';
import type { LinkProviderConfig } from '@account-link/config';
import { logger } from '@account-link/observability';
import { GroupMembershipCheckError, ProfileFetchError, TokenExchangeError } from './errors.js';
import { describeFetchFailure, readErrorBody, readJson } from './http.js';

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
});

const ProfileSchema = z.object({
  sub: z.union([z.string().min(1), z.number().int()]),
  preferred_username: z.string().nullish(),
  nickname: z.string().nullish(),
});

export interface TokenSet {
  accessToken: string;
  tokenType?: string;
  expiresIn?: number;
  scope?: string;
}

export interface ExternalProfile {
  externalId: string;
  displayName: string;
}

export interface IdentityProvider {
  exchangeCode(code: string, codeVerifier: string): Promise<TokenSet>;
  fetchProfile(accessToken: string): Promise<ExternalProfile>;
  /**
   * @returns true on 200, false on 404
   * @throws GroupMembershipCheckError for any other outcome
   */
  checkGroupMembership(groupId: string, externalId: string, accessToken: string): Promise<boolean>;
}

export type IdentityProviderClientConfig = Pick<
  LinkProviderConfig,
  'clientId' | 'clientSecret' | 'tokenUrl' | 'userInfoUrl' | 'groupMembershipUrl' | 'requestTimeoutMs'
>;

/**
 * Fill the `{groupId}` and `{userId}` placeholders of a membership URL template
 */
export function expandGroupMembershipUrl(template: string, groupId: string, userId: string): string {
  return template
    .replaceAll('{groupId}', encodeURIComponent(groupId))
    .replaceAll('{userId}', encodeURIComponent(userId));
}

export class IdentityProviderClient implements IdentityProvider {
  constructor(private readonly config: IdentityProviderClientConfig) {}

  async exchangeCode(code: string, codeVerifier: string): Promise<TokenSet> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: 'authorization_code',
      code,
      code_verifier: codeVerifier,
    });

    let response: Response;
    try {
      response = await fetch(this.config.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new TokenExchangeError(`token request failed: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`);
    }

    if (!response.ok) {
      const errorBody = await readErrorBody(response);
      logger.oauthError('Token exchange failed', { status: response.status, errorBody });
      throw new TokenExchangeError(`token endpoint responded with status ${response.status}`, {
        status: response.status,
        body: errorBody,
      });
    }

    let payload: unknown;
    try {
      payload = await readJson(response);
    } catch (error) {
      throw new TokenExchangeError(
        `token response could not be read: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`
      );
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenExchangeError('no access token received');
    }

    logger.oauthDebug('Authorization code exchanged', { tokenType: parsed.data.token_type });

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      expiresIn: parsed.data.expires_in,
      scope: parsed.data.scope,
    };
  }

  async fetchProfile(accessToken: string): Promise<ExternalProfile> {
    let response: Response;
    try {
      response = await fetch(this.config.userInfoUrl, {
        headers: {
          'Authorization': `Bearer ${accessToken}`,
          'Accept': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new ProfileFetchError(`profile request failed: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`);
    }

    if (!response.ok) {
      throw new ProfileFetchError(`profile endpoint responded with status ${response.status}`, {
        status: response.status,
        body: await readErrorBody(response),
      });
    }

    let payload: unknown;
    try {
      payload = await readJson(response);
    } catch (error) {
      throw new ProfileFetchError(
        `profile response could not be read: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`
      );
    }

    const parsed = ProfileSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProfileFetchError('profile response has no subject');
    }

    const externalId = String(parsed.data.sub);
    const displayName = parsed.data.preferred_username || parsed.data.nickname || externalId;

    return { externalId, displayName };
  }

  async checkGroupMembership(groupId: string, externalId: string, accessToken: string): Promise<boolean> {
    const url = expandGroupMembershipUrl(this.config.groupMembershipUrl, groupId, externalId);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'Authorization': `Bearer ${accessToken}`,
          'Accept': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new GroupMembershipCheckError(
        `group ${groupId} membership check failed: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`,
        groupId
      );
    }

    if (response.status === 200) {
      return true;
    }
    if (response.status === 404) {
      logger.debug('External user is not a group member', { groupId, externalId });
      return false;
    }

    throw new GroupMembershipCheckError(
      `group ${groupId} membership check responded with status ${response.status}`,
      groupId,
      { status: response.status, body: await readErrorBody(response) }
    );
  }
}
