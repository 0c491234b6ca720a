/**
 * In-memory link session store
 *
 * Map-based storage for development, tests and single-process deployments.
 * Sessions are lost on restart and are not visible to other processes.
 */

import type { LinkSessionStore } from '../../interfaces/link-session-store.js';
import { LINK_SESSION_TTL_SECONDS, newLinkSession, type LinkSession, type NewLinkSession } from '../../types.js';
import { logger, prefixOf } from '../../logger.js';

interface StoredSession {
  session: LinkSession;
  expiresAt: number;
}

const SWEEP_INTERVAL_MS = 60 * 1000;

export class MemoryLinkSessionStore implements LinkSessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private sweepInterval?: NodeJS.Timeout;

  constructor() {
    this.sweepInterval = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    if (typeof this.sweepInterval.unref === 'function') {
      this.sweepInterval.unref();
    }
    logger.info('MemoryLinkSessionStore initialized');
  }

  async create(state: string, session: NewLinkSession, ttlSeconds: number = LINK_SESSION_TTL_SECONDS): Promise<LinkSession> {
    const stored = newLinkSession(session);

    this.sessions.set(state, { session: stored, expiresAt: stored.createdAt + ttlSeconds * 1000 });

    logger.oauthDebug('Link session stored in memory', {
      state: prefixOf(state),
      requesterId: session.requesterId,
      tenantId: session.tenantId,
      ttl: ttlSeconds
    });

    return stored;
  }

  async consume(state: string): Promise<LinkSession | null> {
    // Lookup and delete happen in one synchronous turn
    const entry = this.sessions.get(state);
    this.sessions.delete(state);

    if (!entry) {
      logger.oauthWarn('Link session not found (unknown, expired or already used)', {
        state: prefixOf(state)
      });
      return null;
    }

    if (entry.expiresAt <= Date.now()) {
      logger.oauthWarn('Link session expired', {
        state: prefixOf(state),
        expiredAt: new Date(entry.expiresAt).toISOString()
      });
      return null;
    }

    logger.oauthDebug('Link session consumed', { state: prefixOf(state) });
    return entry.session;
  }

  /**
   * Remove expired sessions
   * @returns Number of sessions removed
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [state, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(state);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug('Expired link sessions removed', { removed, remaining: this.sessions.size });
    }
    return removed;
  }

  /**
   * Number of stored sessions, expired ones included until swept
   */
  get size(): number {
    return this.sessions.size;
  }

  dispose(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = undefined;
    }
    this.sessions.clear();
    logger.info('MemoryLinkSessionStore disposed');
  }
}
