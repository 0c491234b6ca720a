/**
 * PKCE (RFC 7636) verifier, challenge and state generation
 */

import { createHash, randomBytes } from 'node:crypto';

export interface PkcePair {
  verifier: string;
  challenge: string;
}

/**
 * 64 random bytes give an 86-character base64url verifier
 */
const VERIFIER_BYTES = 64;
const STATE_BYTES = 16;

/**
 * S256 challenge for a verifier: base64url(sha256(verifier)) without padding
 */
export function deriveChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

export function generateChallenge(): PkcePair {
  const verifier = randomBytes(VERIFIER_BYTES).toString('base64url');
  return { verifier, challenge: deriveChallenge(verifier) };
}

/**
 * Opaque, unguessable state token correlating a link request with its callback
 */
export function generateState(): string {
  return randomBytes(STATE_BYTES).toString('base64url');
}
