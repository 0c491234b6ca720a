/**
 * OAuth configuration schema
 * Single authorization-code + PKCE integration with the identity provider
 */

import { z } from 'zod';

export const DEFAULT_OAUTH_SCOPES = 'openid profile group:read';

/**
 * OAuth configuration schema (non-secret endpoints and settings)
 */
export const OAuthConfigSchema = z.object({
  OAUTH_REDIRECT_URI: z.string().url().default('http://localhost:5000/callback'),
  OAUTH_SCOPES: z.string().min(1).default(DEFAULT_OAUTH_SCOPES),

  OAUTH_AUTHORIZATION_URL: z.string().url().default('https://apis.roblox.com/oauth/v1/authorize'),
  OAUTH_TOKEN_URL: z.string().url().default('https://apis.roblox.com/oauth/v1/token'),
  OAUTH_USER_INFO_URL: z.string().url().default('https://apis.roblox.com/oauth/v1/userinfo'),

  // Template with {groupId} and {userId} placeholders
  OAUTH_GROUP_MEMBERSHIP_URL: z
    .string()
    .includes('{groupId}')
    .includes('{userId}')
    .default('https://apis.roblox.com/cloud/v2/groups/{groupId}/memberships/users%2F{userId}'),
});

export type OAuthConfig = z.infer<typeof OAuthConfigSchema>;

/**
 * OAuth secrets schema (client ID and secret)
 */
export const OAuthSecretsSchema = z.object({
  OAUTH_CLIENT_ID: z.string().optional(),
  OAUTH_CLIENT_SECRET: z.string().optional(),
});

export type OAuthSecrets = z.infer<typeof OAuthSecretsSchema>;
