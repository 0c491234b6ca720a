/**
 * Base configuration schema for the account link service
 * Core settings for the HTTP callback listener
 */

import { z } from 'zod';

/**
 * Base configuration schema (non-secret settings)
 */
export const BaseConfigSchema = z.object({
  // HTTP callback listener
  HTTP_PORT: z.number().int().min(1).max(65535).default(5000),
  HTTP_HOST: z.string().default('0.0.0.0'),

  // Where the browser lands after a successful link (absolute URL or path)
  LINK_SUCCESS_URL: z.string().min(1).default('/success'),

  // Timeout applied to every outbound HTTP call
  REQUEST_TIMEOUT_MS: z.number().int().min(100).max(120_000).default(10_000),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
