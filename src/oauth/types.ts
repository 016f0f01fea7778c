/**
 * OAuth 2.0 authorization-code + PKCE types.
 */

/**
 * PKCE verifier and its S256 challenge. Created once per authorization
 * attempt and never persisted.
 */
export interface PkcePair {
	/** base64url of 32 random bytes (43 url-safe chars) */
	verifier: string
	/** base64url(SHA-256(verifier)), unpadded */
	challenge: string
}

/**
 * Result of the one request the callback listener accepts.
 */
export type CallbackOutcome =
	| { kind: 'code'; code: string }
	| { kind: 'error'; reason: string }
	| { kind: 'state_mismatch' }

/**
 * Access/refresh token pair as issued by the token endpoint.
 */
export interface TokenPair {
	accessToken: string
	refreshToken: string
}

/**
 * Confidential client credentials from the provider's developer portal.
 */
export interface ClientCredentials {
	clientId: string
	clientSecret: string
}

/**
 * Provider endpoints.
 */
export interface OAuthEndpoints {
	/** Browser-facing consent page */
	authorizeUrl: string
	/** Form-encoded POST endpoint for code and refresh grants */
	tokenUrl: string
	/** Bearer-authenticated "who am I" probe */
	userInfoUrl: string
}

/**
 * Lifecycle states of one token acquisition run.
 */
export type LifecycleState = 'cached' | 'refreshing' | 'authorizing' | 'exchanging' | 'done' | 'failed'

/**
 * Credential store keys the token lifecycle reads and writes.
 */
export const TOKEN_KEYS = {
	accessToken: 'access_token',
	refreshToken: 'refresh_token',
} as const
