/**
 * Environment configuration for the account link service
 * Combines all configuration schemas
 */

import { z } from 'zod';
import { BaseConfigSchema } from './base-config.js';
import { OAuthConfigSchema, OAuthSecretsSchema } from './oauth-config.js';
import { PlatformConfigSchema, PlatformSecretsSchema } from './platform-config.js';
import { StorageConfigSchema } from './storage-config.js';
import {
  TenantConfigSourceSchema,
  loadTenantRoleConfig,
  resolveTenantRoleConfigs,
  type TenantRoleConfig
} from './tenant-config.js';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = BaseConfigSchema
  .merge(OAuthConfigSchema)
  .merge(PlatformConfigSchema)
  .merge(StorageConfigSchema)
  .merge(TenantConfigSourceSchema);

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = OAuthSecretsSchema
  .merge(PlatformSecretsSchema);

/**
 * Combined environment schema
 */
export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Secrets = z.infer<typeof SecretsSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Configuration status interface
 */
export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

/**
 * Settings for the identity provider integration
 */
export interface LinkProviderConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  authorizationUrl: string;
  tokenUrl: string;
  userInfoUrl: string;
  groupMembershipUrl: string;
  requestTimeoutMs: number;
}

/**
 * Settings for the chat platform REST client
 */
export interface PlatformClientConfig {
  apiUrl: string;
  botToken: string;
  requestTimeoutMs: number;
}

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: Error | unknown): void;
}

function parseOptionalInt(value: string | undefined, fallback: number): number {
  return value === undefined || value === '' ? fallback : Number(value);
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;
  private static _tenants: TenantRoleConfig[] | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }

    // Parse environment variables with type conversion
    const env = {
      // Base configuration
      HTTP_PORT: parseOptionalInt(process.env.HTTP_PORT, 5000),
      HTTP_HOST: emptyToUndefined(process.env.HTTP_HOST),
      LINK_SUCCESS_URL: emptyToUndefined(process.env.LINK_SUCCESS_URL),
      REQUEST_TIMEOUT_MS: parseOptionalInt(process.env.REQUEST_TIMEOUT_MS, 10_000),
      NODE_ENV: process.env.NODE_ENV || 'development',

      // Identity provider
      OAUTH_CLIENT_ID: emptyToUndefined(process.env.OAUTH_CLIENT_ID),
      OAUTH_CLIENT_SECRET: emptyToUndefined(process.env.OAUTH_CLIENT_SECRET),
      OAUTH_REDIRECT_URI: emptyToUndefined(process.env.OAUTH_REDIRECT_URI),
      OAUTH_SCOPES: emptyToUndefined(process.env.OAUTH_SCOPES),
      OAUTH_AUTHORIZATION_URL: emptyToUndefined(process.env.OAUTH_AUTHORIZATION_URL),
      OAUTH_TOKEN_URL: emptyToUndefined(process.env.OAUTH_TOKEN_URL),
      OAUTH_USER_INFO_URL: emptyToUndefined(process.env.OAUTH_USER_INFO_URL),
      OAUTH_GROUP_MEMBERSHIP_URL: emptyToUndefined(process.env.OAUTH_GROUP_MEMBERSHIP_URL),

      // Chat platform
      DISCORD_API_URL: emptyToUndefined(process.env.DISCORD_API_URL),
      DISCORD_BOT_TOKEN: emptyToUndefined(process.env.DISCORD_BOT_TOKEN),

      // Storage configuration
      REDIS_URL: emptyToUndefined(process.env.REDIS_URL),
      REDIS_KEY_PREFIX: process.env.REDIS_KEY_PREFIX,
      SESSION_STORE_TYPE: emptyToUndefined(process.env.SESSION_STORE_TYPE),
      LINKAGE_STORE_TYPE: emptyToUndefined(process.env.LINKAGE_STORE_TYPE),

      // Tenant role configuration source
      TENANT_CONFIG_PATH: emptyToUndefined(process.env.TENANT_CONFIG_PATH),
      TENANT_CONFIG: emptyToUndefined(process.env.TENANT_CONFIG),
    };

    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', {
          issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
        });
      }
      throw new Error('Invalid environment configuration');
    }

    this._instance = parsed.data;
    this._configStatus = this.analyzeConfiguration(parsed.data);
    return this._instance;
  }

  /**
   * Analyze configuration and separate secrets
   */
  private static analyzeConfiguration(env: Environment): ConfigurationStatus {
    // Parse configuration (safe to log)
    const configuration = ConfigurationSchema.parse(env);

    // Analyze secrets without exposing their values
    const secretKeys = SecretsSchema.keyof().options;
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of secretKeys) {
      if (env[key]) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: secretKeys.length
      }
    };
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Get configuration status
   */
  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    // After load(), _configStatus is guaranteed to be set
    if (!this._configStatus) {
      throw new Error('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      console.warn('EnvironmentConfig: Logger not set, skipping configuration logging');
      return;
    }

    const status = this.getConfigurationStatus();

    this._logger.info('Configuration loaded', { configuration: status.configuration });

    this._logger.info('Secrets Status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    const tenants = this.getTenantRoleConfigs().filter((tenant) => tenant.tenantId !== '0');
    if (tenants.length > 0) {
      this._logger.info('Tenant role configuration loaded', { tenants: tenants.length });
    } else {
      this._logger.warn('No tenants configured; linked accounts will not receive roles');
    }
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
    this._tenants = null;
  }

  /**
   * Get server configuration
   */
  static getServerConfig() {
    const env = this.get();

    return {
      port: env.HTTP_PORT,
      host: env.HTTP_HOST,
      successUrl: env.LINK_SUCCESS_URL,
    };
  }

  /**
   * Get identity provider configuration.
   * Throws when the client credentials are missing.
   */
  static getLinkProviderConfig(): LinkProviderConfig {
    const env = this.get();

    if (!env.OAUTH_CLIENT_ID || !env.OAUTH_CLIENT_SECRET) {
      throw new Error('OAuth client credentials not configured. Set OAUTH_CLIENT_ID and OAUTH_CLIENT_SECRET.');
    }

    return {
      clientId: env.OAUTH_CLIENT_ID,
      clientSecret: env.OAUTH_CLIENT_SECRET,
      redirectUri: env.OAUTH_REDIRECT_URI,
      scopes: env.OAUTH_SCOPES.split(/\s+/).filter(Boolean),
      authorizationUrl: env.OAUTH_AUTHORIZATION_URL,
      tokenUrl: env.OAUTH_TOKEN_URL,
      userInfoUrl: env.OAUTH_USER_INFO_URL,
      groupMembershipUrl: env.OAUTH_GROUP_MEMBERSHIP_URL,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * Get chat platform configuration.
   * Throws when the bot token is missing.
   */
  static getPlatformConfig(): PlatformClientConfig {
    const env = this.get();

    if (!env.DISCORD_BOT_TOKEN) {
      throw new Error('Discord bot token not configured. Set DISCORD_BOT_TOKEN.');
    }

    return {
      apiUrl: env.DISCORD_API_URL,
      botToken: env.DISCORD_BOT_TOKEN,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * Get storage configuration
   */
  static getStorageConfig() {
    const env = this.get();

    return {
      redisUrl: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
      sessionStoreType: env.SESSION_STORE_TYPE,
      linkageStoreType: env.LINKAGE_STORE_TYPE,
    };
  }

  /**
   * Get resolved per-tenant role configuration (loaded once)
   */
  static getTenantRoleConfigs(): TenantRoleConfig[] {
    if (!this._tenants) {
      const env = this.get();
      this._tenants = resolveTenantRoleConfigs(loadTenantRoleConfig(env));
    }
    return this._tenants;
  }
}
