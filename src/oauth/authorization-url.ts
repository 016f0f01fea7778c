/**
 * Consent-page URL construction.
 */

export interface AuthorizationUrlParams {
	authorizeUrl: string
	clientId: string
	redirectUri: string
	scope: string
	state: string
	codeChallenge: string
}

/**
 * Build the authorization endpoint URL the user's browser is sent to.
 *
 * Query parameters keep a fixed order; existing query parameters on
 * `authorizeUrl` are preserved ahead of them.
 *
 * @example
 * ```typescript
 * buildAuthorizationUrl({
 *   authorizeUrl: "https://provider.example/oauth2/authorize",
 *   clientId: "client-123",
 *   redirectUri: "http://localhost:8000/callback",
 *   scope: "tweet.read offline.access",
 *   state,
 *   codeChallenge: pkce.challenge,
 * });
 * // → "https://provider.example/oauth2/authorize?response_type=code&client_id=client-123&..."
 * ```
 */
export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
	const url = new URL(params.authorizeUrl)
	url.searchParams.append('response_type', 'code')
	url.searchParams.append('client_id', params.clientId)
	url.searchParams.append('redirect_uri', params.redirectUri)
	url.searchParams.append('scope', params.scope)
	url.searchParams.append('state', params.state)
	url.searchParams.append('code_challenge', params.codeChallenge)
	url.searchParams.append('code_challenge_method', 'S256')
	return url.toString()
}
