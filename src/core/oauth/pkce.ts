/**
 * PKCE (RFC 7636)
 *
 * Verifiers are drawn from uppercase letters and digits only. RFC 7636
 * allows `[A-Za-z0-9-._~]`; the narrower alphabet is what MyBooks servers
 * have always been sent, so widening it needs a compatibility check first.
 */

import { createHash, randomBytes, randomInt } from 'node:crypto';
import type { CodeChallengeMethod } from './types.js';

export const VERIFIER_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const VERIFIER_MIN_LENGTH = 43;
export const VERIFIER_MAX_LENGTH = 128;

export interface PkcePair {
  verifier: string;
  challenge: string;
  method: CodeChallengeMethod;
}

export function generateVerifier(): string {
  const length = randomInt(VERIFIER_MIN_LENGTH, VERIFIER_MAX_LENGTH + 1);
  let verifier = '';
  for (let i = 0; i < length; i++) {
    verifier += VERIFIER_ALPHABET[randomInt(VERIFIER_ALPHABET.length)];
  }
  return verifier;
}

/**
 * BASE64URL(SHA256(verifier)), unpadded.
 */
export function challengeFromVerifier(verifier: string): string {
  return createHash('sha256').update(verifier, 'utf8').digest('base64url');
}

export function generatePkcePair(): PkcePair {
  const verifier = generateVerifier();
  return {
    verifier,
    challenge: challengeFromVerifier(verifier),
    method: 'S256',
  };
}

/**
 * Random `state` for CSRF binding: 192 bits, base64url.
 */
export function generateState(): string {
  return randomBytes(24).toString('base64url');
}
