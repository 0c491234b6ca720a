/**
 * Shared Redis helpers for the link stores
 */

import { Redis } from 'ioredis';
import { logger } from '../../logger.js';

/**
 * Mask the password in a Redis URL for logging
 */
export function maskRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return 'redis://***';
  }
}

/**
 * Add a trailing colon to a non-empty key prefix ('link-main' → 'link-main:')
 */
export function normalizeKeyPrefix(prefix: string | undefined): string {
  if (!prefix) {
    return '';
  }
  return prefix.endsWith(':') ? prefix : `${prefix}:`;
}

/**
 * Create a Redis client that connects immediately and logs connection events
 *
 * @param connectionName Name for logging (e.g. "link sessions")
 */
export function createRedisClient(redisUrl: string | undefined, connectionName: string): Redis {
  const url = redisUrl ?? process.env.REDIS_URL;
  if (!url) {
    throw new Error('Redis URL not configured. Set REDIS_URL environment variable.');
  }

  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    connectTimeout: 5000,
    retryStrategy: (times) => Math.min(times * 50, 2000),
    lazyConnect: false,
  });

  redis.on('error', (error: unknown) => {
    logger.error(`Redis connection error (${connectionName})`, { error });
  });

  redis.on('connect', () => {
    logger.info(`Redis connected for ${connectionName}`, { url: maskRedisUrl(url) });
  });

  return redis;
}

/**
 * Parse a stored JSON value; malformed text yields undefined
 */
export function parseStoredJson(value: string, key: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    logger.warn('Discarding malformed Redis value', { key, error });
    return undefined;
  }
}
