/**
 * Redis-backed link session store
 *
 * Shared storage for state → session records across processes. Expiry is
 * Redis TTL; consumption is a Lua GET+DEL so a state is handed out once.
 */

import type { Redis } from 'ioredis';
import type { LinkSessionStore } from '../../interfaces/link-session-store.js';
import {
  LINK_SESSION_TTL_SECONDS,
  LinkSessionSchema,
  newLinkSession,
  type LinkSession,
  type NewLinkSession
} from '../../types.js';
import { logger, prefixOf } from '../../logger.js';
import { createRedisClient, normalizeKeyPrefix, parseStoredJson } from './redis-utils.js';

const CONSUME_SCRIPT = `
  local value = redis.call('GET', KEYS[1])
  if value then
    redis.call('DEL', KEYS[1])
  end
  return value
`;

export interface RedisLinkSessionStoreOptions {
  redisUrl?: string;
  keyPrefix?: string;
  /** Existing client; the store will not own its connection */
  client?: Redis;
}

export class RedisLinkSessionStore implements LinkSessionStore {
  private readonly redis: Redis;
  private readonly ownsClient: boolean;
  private readonly keyPrefix: string;

  constructor(options: RedisLinkSessionStoreOptions = {}) {
    this.ownsClient = !options.client;
    this.redis = options.client ?? createRedisClient(options.redisUrl, 'link sessions');
    this.keyPrefix = `${normalizeKeyPrefix(options.keyPrefix)}link:session:`;

    logger.info('RedisLinkSessionStore initialized', { keyPrefix: this.keyPrefix });
  }

  private buildKey(state: string): string {
    return `${this.keyPrefix}${state}`;
  }

  async create(state: string, session: NewLinkSession, ttlSeconds: number = LINK_SESSION_TTL_SECONDS): Promise<LinkSession> {
    const stored = newLinkSession(session);

    await this.redis.set(this.buildKey(state), JSON.stringify(stored), 'EX', ttlSeconds);

    logger.oauthDebug('Link session stored in Redis', {
      state: prefixOf(state),
      requesterId: session.requesterId,
      tenantId: session.tenantId,
      ttl: ttlSeconds
    });

    return stored;
  }

  async consume(state: string): Promise<LinkSession | null> {
    const key = this.buildKey(state);
    const value = await this.redis.eval(CONSUME_SCRIPT, 1, key);

    if (typeof value !== 'string') {
      logger.oauthWarn('Link session not found (unknown, expired or already used)', {
        state: prefixOf(state)
      });
      return null;
    }

    const parsed = LinkSessionSchema.safeParse(parseStoredJson(value, key));
    if (!parsed.success) {
      logger.warn('Discarding link session with unexpected shape', {
        state: prefixOf(state),
        issues: parsed.error.issues.map((issue) => issue.path.join('.'))
      });
      return null;
    }

    logger.oauthDebug('Link session consumed from Redis', { state: prefixOf(state) });
    return parsed.data;
  }

  dispose(): void {
    if (this.ownsClient) {
      this.redis.disconnect();
    }
    logger.info('RedisLinkSessionStore disposed');
  }
}
