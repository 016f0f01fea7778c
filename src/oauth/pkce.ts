/**
 * PKCE (RFC 7636) verifier/challenge and anti-CSRF state generation.
 */

import { createHash, randomBytes } from 'node:crypto'
import type { PkcePair } from './types.ts'

/** Raw entropy for the verifier; base64url encodes 32 bytes as 43 chars */
const VERIFIER_BYTES = 32

/** Raw entropy for the state token */
const STATE_BYTES = 16

/**
 * Compute the S256 code challenge for a verifier.
 *
 * @returns base64url(SHA-256(verifier)) without padding
 */
export function deriveCodeChallenge(verifier: string): string {
	return createHash('sha256').update(verifier).digest('base64url')
}

/**
 * Generate a fresh PKCE pair from a CSPRNG.
 */
export function generatePkcePair(): PkcePair {
	const verifier = randomBytes(VERIFIER_BYTES).toString('base64url')
	return { verifier, challenge: deriveCodeChallenge(verifier) }
}

/**
 * Generate a url-safe anti-CSRF state token.
 */
export function generateState(): string {
	return randomBytes(STATE_BYTES).toString('base64url')
}
