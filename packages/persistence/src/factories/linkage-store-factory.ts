/**
 * Linkage Store Factory
 *
 * Same selection rules as the session store factory, driven by
 * LINKAGE_STORE_TYPE. The memory store loses every linkage on restart.
 */

import type { LinkageStore } from '../interfaces/linkage-store.js';
import { MemoryLinkageStore } from '../stores/memory/memory-linkage-store.js';
import { RedisLinkageStore } from '../stores/redis/redis-linkage-store.js';
import { logger } from '../logger.js';
import type { LinkSessionStoreType, StoreFactoryOptions } from './link-session-store-factory.js';

export type LinkageStoreType = LinkSessionStoreType;

export class LinkageStoreFactory {
  static create(options: StoreFactoryOptions<LinkageStoreType> = {}): LinkageStore {
    const redisUrl = options.redisUrl ?? process.env.REDIS_URL;
    const keyPrefix = options.keyPrefix ?? process.env.REDIS_KEY_PREFIX;
    const storeType = options.type ?? 'auto';

    if (storeType === 'redis' || (storeType === 'auto' && redisUrl)) {
      if (!redisUrl) {
        throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
      }
      logger.info('Creating Redis linkage store', { detected: storeType === 'auto' });
      return new RedisLinkageStore({ redisUrl, keyPrefix });
    }

    if (process.env.NODE_ENV === 'production') {
      logger.warn('Memory linkage store in production: linkages will not survive a restart');
    }
    return new MemoryLinkageStore();
  }
}

export function createLinkageStore(options?: StoreFactoryOptions<LinkageStoreType>): LinkageStore {
  return LinkageStoreFactory.create(options);
}
