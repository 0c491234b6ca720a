import { deriveChallenge, generateChallenge, generateState } from '../src/index.js';

describe('PKCE generation', () => {
  it('derives the RFC 7636 example challenge', () => {
    expect(deriveChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).toBe(
      'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'
    );
  });

  it('produces an 86-character URL-safe verifier', () => {
    const { verifier } = generateChallenge();

    expect(verifier).toHaveLength(86);
    expect(verifier).toMatch(/^[A-Za-z0-9_-]+$/);
  });

  it('pairs each verifier with its S256 challenge', () => {
    const { verifier, challenge } = generateChallenge();

    expect(challenge).toBe(deriveChallenge(verifier));
    expect(challenge).toHaveLength(43);
    expect(challenge).not.toContain('=');
  });

  it('never repeats a verifier', () => {
    const verifiers = new Set(Array.from({ length: 50 }, () => generateChallenge().verifier));
    expect(verifiers.size).toBe(50);
  });

  it('generates 22-character state tokens', () => {
    const state = generateState();

    expect(state).toHaveLength(22);
    expect(state).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(generateState()).not.toBe(state);
  });
});
