/**
 * OAuth 2.0 Authorization Code with PKCE for a loopback-redirect client.
 *
 * ## Usage
 *
 * ```typescript
 * import { createTokenClient, ensureAccessToken } from "loopback-pkce/oauth";
 * import { JsonCredentialStore } from "loopback-pkce/store";
 * import { resolveSettings } from "loopback-pkce/config";
 *
 * const settings = resolveSettings();
 * const accessToken = await ensureAccessToken({
 *   store: new JsonCredentialStore(settings.storePath),
 *   client: createTokenClient({ endpoints: settings.endpoints }),
 *   credentials: { clientId, clientSecret },
 *   settings,
 *   openBrowser,
 * });
 * ```
 *
 * @module oauth
 */

export { buildAuthorizationUrl, type AuthorizationUrlParams } from './authorization-url.ts'
export {
	type CallbackListener,
	type CallbackListenerOptions,
	DEFAULT_CALLBACK_PATH,
	escapeHtml,
	resolveCallbackOutcome,
	startCallbackListener,
	stateMatches,
} from './callback-listener.ts'
export {
	ConsentTimeoutError,
	CredentialRejectedError,
	type FatalAuthError,
	isFatalAuthError,
	ProtocolViolationError,
	ProviderError,
	type RefreshResult,
	TransportError,
} from './errors.ts'
export { attemptRefresh, type EnsureAccessTokenOptions, ensureAccessToken, type TokenLifecycleDeps } from './lifecycle.ts'
export { deriveCodeChallenge, generatePkcePair, generateState } from './pkce.ts'
export {
	createTokenClient,
	DEFAULT_PROBE_TIMEOUT_MS,
	DEFAULT_TOKEN_TIMEOUT_MS,
	type ExchangeCodeRequest,
	exchangeCode,
	type FetchLike,
	type HttpOptions,
	isTokenValid,
	type RefreshRequest,
	refreshTokens,
	type TokenClient,
	type TokenClientOptions,
} from './token-client.ts'
export type {
	CallbackOutcome,
	ClientCredentials,
	LifecycleState,
	OAuthEndpoints,
	PkcePair,
	TokenPair,
} from './types.ts'
export { TOKEN_KEYS } from './types.ts'
