/**
 * Chat platform port used for role grants and display names
 */

export interface TenantMember {
  userId: string;
  roleIds: string[];
}

export interface RoleGrant {
  /** Roles the member did not hold before the call */
  granted: string[];
  /** Requested roles that do not exist in the tenant; never sent */
  unknown: string[];
}

export interface MemberDirectory {
  /**
   * @returns null when the user (or the bot) is not in the tenant
   */
  fetchMember(tenantId: string, userId: string): Promise<TenantMember | null>;

  /**
   * Grant roles in a single update, keeping every role the member holds at
   * the time of the update. Role ids unknown to the tenant are left out.
   */
  addRoles(tenantId: string, userId: string, roleIds: string[], reason: string): Promise<RoleGrant>;

  /**
   * @returns the user's display name, or null for an unknown user
   */
  fetchUser(userId: string): Promise<string | null>;
}
