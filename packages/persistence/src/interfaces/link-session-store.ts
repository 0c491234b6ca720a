/**
 * Link session store interface
 *
 * Holds state → { requester, tenant, code_verifier } for the duration of
 * one authorization round-trip. Must be a shared backend (Redis) when more
 * than one process serves callbacks.
 */

import type { LinkSession, NewLinkSession } from '../types.js';

export interface LinkSessionStore {
  /**
   * Store a session under its state token
   * @param ttlSeconds - Lifetime (default: 600 = 10 minutes)
   */
  create(state: string, session: NewLinkSession, ttlSeconds?: number): Promise<LinkSession>;

  /**
   * Atomically retrieve and delete a session.
   * Returns null for unknown, expired or already consumed states; of two
   * concurrent calls for one state at most one receives the session.
   */
  consume(state: string): Promise<LinkSession | null>;

  /**
   * Release timers and connections
   */
  dispose(): void;
}
