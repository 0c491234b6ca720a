/**
 * Storage/persistence configuration schema
 * Backend selection for link sessions and linkages
 */

import { z } from 'zod';

/**
 * Storage configuration schema
 */
export const StorageConfigSchema = z.object({
  // Redis connection
  REDIS_URL: z.string().url().optional(),

  // Redis key prefix for multi-app isolation (e.g. 'link-main:')
  REDIS_KEY_PREFIX: z.string().optional().default(''),

  // Explicit backend selection (auto-detect if not set)
  SESSION_STORE_TYPE: z.enum(['memory', 'redis']).optional(),
  LINKAGE_STORE_TYPE: z.enum(['memory', 'redis']).optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
