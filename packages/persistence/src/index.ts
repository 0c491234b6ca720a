/**
 * @account-link/persistence
 *
 * Storage for link sessions (ephemeral, state-keyed) and linkages
 * (durable, requester-keyed), with memory and Redis backends.
 *
 * ```typescript
 * import { createLinkSessionStore, createLinkageStore, setLogger } from '@account-link/persistence';
 *
 * setLogger(myLogger);
 * const sessions = createLinkSessionStore({ type: 'redis', redisUrl: 'redis://localhost:6379' });
 * const linkages = createLinkageStore();
 * ```
 */

// Types
export {
  LINK_SESSION_TTL_SECONDS,
  LinkSessionSchema,
  newLinkSession,
  LinkageSchema,
  type LinkSession,
  type NewLinkSession,
  type Linkage,
  type LinkageInput,
  type StoreBackend
} from './types.js';

// Interfaces
export type { LinkSessionStore } from './interfaces/link-session-store.js';
export type { LinkageStore } from './interfaces/linkage-store.js';

// Logger
export { setLogger, type PersistenceLogger } from './logger.js';

// Stores
export { MemoryLinkSessionStore } from './stores/memory/memory-link-session-store.js';
export { MemoryLinkageStore } from './stores/memory/memory-linkage-store.js';
export { RedisLinkSessionStore, type RedisLinkSessionStoreOptions } from './stores/redis/redis-link-session-store.js';
export { RedisLinkageStore, type RedisLinkageStoreOptions } from './stores/redis/redis-linkage-store.js';
export { maskRedisUrl, normalizeKeyPrefix } from './stores/redis/redis-utils.js';

// Factories
export {
  LinkSessionStoreFactory,
  createLinkSessionStore,
  type LinkSessionStoreType,
  type StoreFactoryOptions
} from './factories/link-session-store-factory.js';
export { LinkageStoreFactory, createLinkageStore, type LinkageStoreType } from './factories/linkage-store-factory.js';
