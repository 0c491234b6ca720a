/**
 * Role reconciliation across tenants
 *
 * Grants the verified role and, for members of the tenant's external
 * group, the group member role. Roles are only ever added. A failure in one
 * tenant is recorded and does not stop the others.
 */

import { DEFAULT_TENANT_ID, type TenantRoleConfig } from '@account-link/config';
import { logger, recordLinkEvent } from '@account-link/observability';
import type { IdentityProvider } from './identity-provider-client.js';
import type { MemberDirectory, TenantMember } from './member-directory.js';
import {
  GroupMembershipCheckError,
  RoleApplicationError,
  errorMessage,
  type LinkError
} from './errors.js';

export const ROLE_GRANT_REASON = 'Account Verification';

export interface RoleSyncResult {
  appliedPerTenant: Record<string, string[]>;
  errorsPerTenant: Record<string, LinkError[]>;
  skippedTenants: string[];
}

export interface RoleSynchronizerDependencies {
  tenants: readonly TenantRoleConfig[];
  identityProvider: Pick<IdentityProvider, 'checkGroupMembership'>;
  memberDirectory: Pick<MemberDirectory, 'fetchMember' | 'addRoles'>;
}

export function emptyRoleSyncResult(): RoleSyncResult {
  return { appliedPerTenant: {}, errorsPerTenant: {}, skippedTenants: [] };
}

export class RoleSynchronizer {
  constructor(private readonly deps: RoleSynchronizerDependencies) {}

  async apply(requesterId: string, externalId: string, accessToken: string): Promise<RoleSyncResult> {
    const result = emptyRoleSyncResult();
    // groupId -> is member, for this run only
    const groupMembership = new Map<string, boolean>();

    const recordError = (tenantId: string, error: LinkError): void => {
      (result.errorsPerTenant[tenantId] ??= []).push(error);
    };

    for (const tenant of this.deps.tenants) {
      if (tenant.tenantId === DEFAULT_TENANT_ID) {
        continue;
      }
      const { tenantId } = tenant;

      if (!tenant.verifiedRoleId && !tenant.groupMemberRoleId) {
        result.skippedTenants.push(tenantId);
        continue;
      }

      let member: TenantMember | null;
      try {
        member = await this.deps.memberDirectory.fetchMember(tenantId, requesterId);
      } catch (error) {
        logger.warn('Failed to fetch tenant member', { tenantId, requesterId, error: errorMessage(error) });
        recordError(tenantId, new RoleApplicationError(
          `failed to fetch member ${requesterId}: ${errorMessage(error)}`,
          tenantId,
          error
        ));
        continue;
      }

      if (!member) {
        result.skippedTenants.push(tenantId);
        continue;
      }

      let isGroupMember = false;
      if (tenant.groupMemberRoleId && tenant.externalGroupId) {
        const groupId = tenant.externalGroupId;
        const cached = groupMembership.get(groupId);
        if (cached !== undefined) {
          isGroupMember = cached;
        } else {
          try {
            isGroupMember = await this.deps.identityProvider.checkGroupMembership(groupId, externalId, accessToken);
          } catch (error) {
            logger.warn('Group membership check failed', { tenantId, groupId, error: errorMessage(error) });
            recordError(tenantId, error instanceof GroupMembershipCheckError
              ? error
              : new GroupMembershipCheckError(`group ${groupId} membership check failed: ${errorMessage(error)}`, groupId, error));
            isGroupMember = false;
          }
          groupMembership.set(groupId, isGroupMember);
        }
      }

      const candidates = new Set<string>();
      if (tenant.verifiedRoleId) {
        candidates.add(tenant.verifiedRoleId);
      }
      if (isGroupMember && tenant.groupMemberRoleId) {
        candidates.add(tenant.groupMemberRoleId);
      }

      const held = new Set(member.roleIds);
      const additions = [...candidates].filter((roleId) => !held.has(roleId));

      if (additions.length === 0) {
        result.appliedPerTenant[tenantId] = [];
        continue;
      }

      try {
        const grant = await this.deps.memberDirectory.addRoles(tenantId, requesterId, additions, ROLE_GRANT_REASON);
        result.appliedPerTenant[tenantId] = grant.granted;
        if (grant.granted.length > 0) {
          logger.info('Roles applied', { tenantId, requesterId, roleIds: grant.granted });
          recordLinkEvent('roles_applied', { tenant: tenantId });
        }
        if (grant.unknown.length > 0) {
          logger.warn('Configured roles missing from tenant', { tenantId, roleIds: grant.unknown });
          recordError(tenantId, new RoleApplicationError(
            `roles ${grant.unknown.join(', ')} do not exist in tenant ${tenantId}`,
            tenantId
          ));
        }
      } catch (error) {
        logger.warn('Failed to apply roles', { tenantId, requesterId, error: errorMessage(error) });
        recordError(tenantId, new RoleApplicationError(
          `failed to add roles ${additions.join(', ')}: ${errorMessage(error)}`,
          tenantId,
          error
        ));
      }
    }

    return result;
  }
}
