/**
 * Link Session Store Factory
 *
 * Picks the session backend once at startup:
 * - explicit type ('memory' | 'redis'), e.g. from SESSION_STORE_TYPE
 * - otherwise Redis when a Redis URL is configured, else memory
 */

import type { LinkSessionStore } from '../interfaces/link-session-store.js';
import type { StoreBackend } from '../types.js';
import { MemoryLinkSessionStore } from '../stores/memory/memory-link-session-store.js';
import { RedisLinkSessionStore } from '../stores/redis/redis-link-session-store.js';
import { logger } from '../logger.js';

export type LinkSessionStoreType = StoreBackend | 'auto';

export interface StoreFactoryOptions<T extends string = LinkSessionStoreType> {
  /** Defaults to 'auto' */
  type?: T;
  /** Defaults to REDIS_URL */
  redisUrl?: string;
  /** Defaults to REDIS_KEY_PREFIX */
  keyPrefix?: string;
}

export class LinkSessionStoreFactory {
  static create(options: StoreFactoryOptions = {}): LinkSessionStore {
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;
    const keyPrefix = options.keyPrefix ?? process.env.REDIS_KEY_PREFIX;
    const storeType = options.type ?? 'auto';

    switch (storeType) {
      case 'memory':
        return new MemoryLinkSessionStore();

      case 'redis':
        return this.createRedisStore(redisUrl, keyPrefix);

      case 'auto':
        if (redisUrl) {
          logger.info('Creating Redis link session store', { detected: true });
          return this.createRedisStore(redisUrl, keyPrefix);
        }
        if (process.env.NODE_ENV !== 'test') {
          logger.warn('Memory link session store does not span processes', {
            recommendation: 'Configure REDIS_URL when more than one instance serves callbacks'
          });
        }
        return new MemoryLinkSessionStore();
    }
  }

  private static createRedisStore(redisUrl: string | undefined, keyPrefix: string | undefined): RedisLinkSessionStore {
    if (!redisUrl) {
      throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
    }
    return new RedisLinkSessionStore({ redisUrl, keyPrefix });
  }
}

/**
 * Convenience function to create a link session store with auto-detection
 */
export function createLinkSessionStore(options?: StoreFactoryOptions): LinkSessionStore {
  return LinkSessionStoreFactory.create(options);
}
