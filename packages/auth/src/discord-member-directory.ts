/**
 * MemberDirectory backed by the Discord REST API
 */

import { z } from 'zod';
import type { PlatformClientConfig } from '@account-link/config';
import { logger } from '@account-link/observability';
import type { MemberDirectory, RoleGrant, TenantMember } from './member-directory.js';
import { PlatformApiError } from './errors.js';
import { describeFetchFailure, readErrorBody, readJson } from './http.js';

const GuildMemberSchema = z.object({
  roles: z.array(z.string()),
});

const GuildRolesSchema = z.array(z.object({
  id: z.string(),
}));

const UserSchema = z.object({
  username: z.string(),
  global_name: z.string().nullish(),
});

export class DiscordMemberDirectory implements MemberDirectory {
  private readonly apiUrl: string;

  constructor(private readonly config: PlatformClientConfig) {
    this.apiUrl = config.apiUrl.replace(/\/+$/, '');
  }

  private async request(method: string, path: string, init: { body?: unknown; reason?: string } = {}): Promise<Response> {
    const headers: Record<string, string> = {
      'Authorization': `Bot ${this.config.botToken}`,
      'Accept': 'application/json',
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (init.reason) {
      headers['X-Audit-Log-Reason'] = encodeURIComponent(init.reason);
    }

    try {
      return await fetch(`${this.apiUrl}${path}`, {
        method,
        headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new PlatformApiError(`${method} ${path} failed: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`);
    }
  }

  private async readBody(method: string, path: string, response: Response): Promise<unknown> {
    try {
      return await readJson(response);
    } catch (error) {
      throw new PlatformApiError(
        `${method} ${path} response could not be read: ${describeFetchFailure(error, this.config.requestTimeoutMs)}`,
        response.status
      );
    }
  }

  private async fail(method: string, path: string, response: Response): Promise<never> {
    const body = await readErrorBody(response);
    throw new PlatformApiError(`${method} ${path} responded with status ${response.status}`, response.status, { body });
  }

  async fetchMember(tenantId: string, userId: string): Promise<TenantMember | null> {
    const path = `/guilds/${encodeURIComponent(tenantId)}/members/${encodeURIComponent(userId)}`;
    const response = await this.request('GET', path);

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      return this.fail('GET', path, response);
    }

    const parsed = GuildMemberSchema.safeParse(await this.readBody('GET', path, response));
    if (!parsed.success) {
      throw new PlatformApiError(`GET ${path} returned an unexpected member payload`, response.status);
    }
    return { userId, roleIds: parsed.data.roles };
  }

  async fetchRoleIds(tenantId: string): Promise<Set<string>> {
    const path = `/guilds/${encodeURIComponent(tenantId)}/roles`;
    const response = await this.request('GET', path);
    if (!response.ok) {
      return this.fail('GET', path, response);
    }

    const parsed = GuildRolesSchema.safeParse(await this.readBody('GET', path, response));
    if (!parsed.success) {
      throw new PlatformApiError(`GET ${path} returned an unexpected roles payload`, response.status);
    }
    return new Set(parsed.data.map((role) => role.id));
  }

  async addRoles(tenantId: string, userId: string, roleIds: string[], reason: string): Promise<RoleGrant> {
    const existing = await this.fetchRoleIds(tenantId);
    const known = roleIds.filter((roleId) => existing.has(roleId));
    const unknown = roleIds.filter((roleId) => !existing.has(roleId));
    if (known.length === 0) {
      return { granted: [], unknown };
    }

    // The PATCH replaces the role list, so start from the roles held right now
    const member = await this.fetchMember(tenantId, userId);
    if (!member) {
      throw new PlatformApiError(`member ${userId} is no longer in guild ${tenantId}`, 404);
    }
    const held = new Set(member.roleIds);
    const granted = [...new Set(known)].filter((roleId) => !held.has(roleId));
    if (granted.length === 0) {
      return { granted, unknown };
    }

    const path = `/guilds/${encodeURIComponent(tenantId)}/members/${encodeURIComponent(userId)}`;
    const response = await this.request('PATCH', path, { body: { roles: [...member.roleIds, ...granted] }, reason });
    if (!response.ok) {
      return this.fail('PATCH', path, response);
    }

    logger.info('Roles granted', { tenantId, userId, roleIds: granted });
    return { granted, unknown };
  }

  async fetchUser(userId: string): Promise<string | null> {
    const path = `/users/${encodeURIComponent(userId)}`;
    const response = await this.request('GET', path);

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      return this.fail('GET', path, response);
    }

    const parsed = UserSchema.safeParse(await this.readBody('GET', path, response));
    if (!parsed.success) {
      throw new PlatformApiError(`GET ${path} returned an unexpected user payload`, response.status);
    }
    return parsed.data.global_name ?? parsed.data.username;
  }
}
