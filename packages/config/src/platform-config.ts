/**
 * Chat platform configuration schema
 * Discord REST access used for member lookup and role grants
 */

import { z } from 'zod';

export const PlatformConfigSchema = z.object({
  DISCORD_API_URL: z.string().url().default('https://discord.com/api/v10'),
});

export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;

/**
 * Platform secrets schema (bot token)
 */
export const PlatformSecretsSchema = z.object({
  DISCORD_BOT_TOKEN: z.string().optional(),
});

export type PlatformSecrets = z.infer<typeof PlatformSecretsSchema>;
