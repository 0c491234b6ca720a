/**
 * Per-tenant role configuration
 *
 * Maps each tenant (guild) id to the roles granted on link. The entry with
 * tenant id "0" is not a tenant: it supplies the values a tenant entry leaves
 * unset. A role or group id of "0" or "" means "not configured".
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const DEFAULT_TENANT_ID = '0';

// Snowflakes overflow JSON numbers, so strings are preferred; safe integers are accepted
const IdSchema = z
  .union([z.string(), z.number().int().nonnegative().safe()])
  .transform((value) => String(value).trim());

export const TenantRoleEntrySchema = z
  .object({
    verifiedRoleId: IdSchema.optional(),
    groupMemberRoleId: IdSchema.optional(),
    externalGroupId: IdSchema.optional(),
  })
  .strict();

export const TenantRoleConfigMapSchema = z.record(
  z.string().regex(/^\d+$/, 'Tenant ids must be numeric strings'),
  TenantRoleEntrySchema
);

export type TenantRoleEntry = z.infer<typeof TenantRoleEntrySchema>;
export type TenantRoleConfigMap = z.infer<typeof TenantRoleConfigMapSchema>;

/**
 * Source settings for the tenant role configuration (non-secret)
 */
export const TenantConfigSourceSchema = z.object({
  TENANT_CONFIG_PATH: z.string().optional(),
  TENANT_CONFIG: z.string().optional(),
});

export type TenantConfigSource = z.infer<typeof TenantConfigSourceSchema>;

/**
 * A tenant's effective role configuration after defaults are applied
 */
export interface TenantRoleConfig {
  tenantId: string;
  verifiedRoleId?: string;
  groupMemberRoleId?: string;
  externalGroupId?: string;
}

export class TenantConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TenantConfigError';
  }
}

/**
 * Validate a parsed tenant role configuration document
 */
export function parseTenantRoleConfig(raw: unknown): TenantRoleConfigMap {
  const result = TenantRoleConfigMapSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new TenantConfigError(`Invalid tenant role configuration: ${issues}`, result.error);
  }
  return result.data;
}

function parseJson(text: string, origin: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TenantConfigError(`Tenant role configuration in ${origin} is not valid JSON`, error);
  }
}

/**
 * Load the tenant role configuration.
 *
 * `TENANT_CONFIG_PATH` wins over inline `TENANT_CONFIG`. With neither set,
 * only an empty defaults entry exists and no tenant receives roles.
 */
export function loadTenantRoleConfig(source: TenantConfigSource): TenantRoleConfigMap {
  if (source.TENANT_CONFIG_PATH) {
    let text: string;
    try {
      text = readFileSync(source.TENANT_CONFIG_PATH, 'utf8');
    } catch (error) {
      throw new TenantConfigError(
        `Unable to read tenant role configuration from ${source.TENANT_CONFIG_PATH}`,
        error
      );
    }
    return parseTenantRoleConfig(parseJson(text, source.TENANT_CONFIG_PATH));
  }

  if (source.TENANT_CONFIG) {
    return parseTenantRoleConfig(parseJson(source.TENANT_CONFIG, 'TENANT_CONFIG'));
  }

  return { [DEFAULT_TENANT_ID]: {} };
}

function configuredId(value: string | undefined): string | undefined {
  return value && value !== '0' ? value : undefined;
}

/**
 * Apply the "0" defaults entry to every tenant entry.
 * The defaults entry itself is kept in the result so callers can see it.
 */
export function resolveTenantRoleConfigs(map: TenantRoleConfigMap): TenantRoleConfig[] {
  const defaults = map[DEFAULT_TENANT_ID] ?? {};

  return Object.entries(map).map(([tenantId, entry]) => ({
    tenantId,
    verifiedRoleId: configuredId(entry.verifiedRoleId ?? defaults.verifiedRoleId),
    groupMemberRoleId: configuredId(entry.groupMemberRoleId ?? defaults.groupMemberRoleId),
    externalGroupId: configuredId(entry.externalGroupId ?? defaults.externalGroupId),
  }));
}
