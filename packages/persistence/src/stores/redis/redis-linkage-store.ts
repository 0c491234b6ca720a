/**
 * Redis-backed linkage store
 *
 * One JSON value per requester under `<prefix>link:linkage:<requesterId>`,
 * without expiry.
 */

import type { Redis } from 'ioredis';
import type { LinkageStore } from '../../interfaces/linkage-store.js';
import { LinkageSchema, type Linkage, type LinkageInput } from '../../types.js';
import { logger } from '../../logger.js';
import { createRedisClient, normalizeKeyPrefix, parseStoredJson } from './redis-utils.js';

export interface RedisLinkageStoreOptions {
  redisUrl?: string;
  keyPrefix?: string;
  client?: Redis;
}

export class RedisLinkageStore implements LinkageStore {
  private readonly redis: Redis;
  private readonly ownsClient: boolean;
  private readonly keyPrefix: string;

  constructor(options: RedisLinkageStoreOptions = {}) {
    this.ownsClient = !options.client;
    this.redis = options.client ?? createRedisClient(options.redisUrl, 'linkages');
    this.keyPrefix = `${normalizeKeyPrefix(options.keyPrefix)}link:linkage:`;
  }

  private buildKey(requesterId: string): string {
    return `${this.keyPrefix}${requesterId}`;
  }

  async getByRequester(requesterId: string): Promise<Linkage | null> {
    const key = this.buildKey(requesterId);
    const value = await this.redis.get(key);
    if (value === null) {
      return null;
    }

    const parsed = LinkageSchema.safeParse(parseStoredJson(value, key));
    if (!parsed.success) {
      logger.warn('Ignoring linkage with unexpected shape', { requesterId });
      return null;
    }
    return parsed.data;
  }

  async upsert(input: LinkageInput): Promise<Linkage> {
    const linkage: Linkage = {
      requesterId: input.requesterId,
      externalId: input.externalId,
      externalDisplayName: input.externalDisplayName,
      linkedAt: new Date().toISOString()
    };

    await this.redis.set(this.buildKey(input.requesterId), JSON.stringify(linkage));

    logger.info('Linkage stored', { requesterId: input.requesterId, externalId: input.externalId });
    return linkage;
  }

  async delete(requesterId: string): Promise<boolean> {
    const removed = await this.redis.del(this.buildKey(requesterId));
    if (removed > 0) {
      logger.info('Linkage deleted', { requesterId });
    }
    return removed > 0;
  }

  dispose(): void {
    if (this.ownsClient) {
      this.redis.disconnect();
    }
  }
}
