/**
 * Persistence record shapes
 *
 * Records are validated against these schemas on the way in (invalid input
 * is rejected) and on the way out (anything that does not match is treated
 * as absent).
 */

import { z } from 'zod';

/**
 * Default link session lifetime in seconds
 */
export const LINK_SESSION_TTL_SECONDS = 600;

export const LinkSessionSchema = z.object({
  requesterId: z.string().min(1),
  tenantId: z.string().min(1),
  codeVerifier: z.string().regex(/^[A-Za-z0-9\-._~]{43,128}$/),
  createdAt: z.number().int().nonnegative(),
}).strict();

/**
 * Ephemeral correlation record for one authorization attempt, keyed by state
 */
export type LinkSession = z.infer<typeof LinkSessionSchema>;

/**
 * Stamp a new session and check it against the schema
 *
 * @throws ZodError when the session does not have the expected shape
 */
export function newLinkSession(session: NewLinkSession, createdAt: number = Date.now()): LinkSession {
  return LinkSessionSchema.parse({ ...session, createdAt });
}

export type NewLinkSession = Omit<LinkSession, 'createdAt'>;

export const LinkageSchema = z.object({
  requesterId: z.string().min(1),
  externalId: z.string().min(1),
  externalDisplayName: z.string(),
  linkedAt: z.string().datetime(),
}).strict();

/**
 * Durable mapping from a chat-platform user to an external identity
 */
export type Linkage = z.infer<typeof LinkageSchema>;

export type LinkageInput = Omit<Linkage, 'linkedAt'>;

export type StoreBackend = 'memory' | 'redis';
