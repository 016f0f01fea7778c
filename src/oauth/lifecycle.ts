/**
 * Token lifecycle: reuse the cached token, refresh it, or run the full
 * interactive authorization, then write the result through to the store.
 *
 * ```
 * cached ──valid──────────────────────────────▶ done
 *   │ invalid / missing / force
 *   ▼
 * refreshing ──ok────────────────────────────▶ done (persisted)
 *   │ any failure (ignorable)
 *   ▼
 * authorizing ──code──▶ exchanging ──ok──────▶ done (persisted)
 *   │ state mismatch / provider error   │ rejected
 *   ▼                                   ▼
 * failed ◀───────────────────────────────────┘ (nothing persisted)
 * ```
 *
 * @module oauth/lifecycle
 */

import type { OAuthSettings } from '../config/settings.ts'
import { toError } from '../errors/index.ts'
import { createCorrelationId, lifecycleLogger } from '../logger.ts'
import type { CredentialStore } from '../store/types.ts'
import { buildAuthorizationUrl } from './authorization-url.ts'
import { type CallbackListener, type CallbackListenerOptions, startCallbackListener } from './callback-listener.ts'
import { ProtocolViolationError, ProviderError, type RefreshResult } from './errors.ts'
import { generatePkcePair, generateState } from './pkce.ts'
import type { TokenClient } from './token-client.ts'
import { type ClientCredentials, type LifecycleState, TOKEN_KEYS, type TokenPair } from './types.ts'

export interface TokenLifecycleDeps {
	store: CredentialStore
	client: TokenClient
	credentials: ClientCredentials
	settings: Pick<OAuthSettings, 'endpoints' | 'redirect' | 'scope' | 'consentTimeoutMs'>
	/** Navigate the user's browser; a rejection is logged and the flow keeps waiting */
	openBrowser: (url: string) => Promise<void>
	/** Shown to the user before the browser opens, for manual navigation */
	onAuthorizationUrl?: (url: string) => void
	/** Observer for every state change */
	onTransition?: (from: LifecycleState, to: LifecycleState) => void
	/** Defaults to the loopback HTTP listener */
	startListener?: (options: CallbackListenerOptions) => Promise<CallbackListener>
}

export interface EnsureAccessTokenOptions {
	/** Skip the cache and the refresh token; always run the interactive flow */
	force?: boolean
}

/**
 * Return an access token the provider accepts, acquiring one if needed.
 *
 * @throws {ProtocolViolationError} The callback's state did not match
 * @throws {ProviderError} The provider redirected back with an error
 * @throws {TransportError} The code exchange failed or was rejected, or the listener could not bind
 * @throws {ConsentTimeoutError} A consent timeout is configured and expired
 */
export async function ensureAccessToken(deps: TokenLifecycleDeps, options: EnsureAccessTokenOptions = {}): Promise<string> {
	const cid = createCorrelationId()
	const force = options.force ?? false
	let state: LifecycleState = 'cached'

	const moveTo = (next: LifecycleState): void => {
		lifecycleLogger.debug('Token lifecycle transition', { cid, from: state, to: next })
		deps.onTransition?.(state, next)
		state = next
	}

	const cachedAccess = deps.store.get(TOKEN_KEYS.accessToken)
	const cachedRefresh = deps.store.get(TOKEN_KEYS.refreshToken)

	if (!force && cachedAccess && (await probeCachedToken(deps.client, cachedAccess, cid))) {
		moveTo('done')
		lifecycleLogger.info('Reusing cached access token', { cid })
		return cachedAccess
	}

	if (!force && cachedRefresh) {
		moveTo('refreshing')
		const refreshed = await attemptRefresh(deps, cachedRefresh)
		if (refreshed.success) {
			persist(deps.store, refreshed.tokens)
			moveTo('done')
			lifecycleLogger.info('Access token refreshed', { cid })
			return refreshed.tokens.accessToken
		}
		lifecycleLogger.warning('Refresh failed; falling back to full authorization', {
			cid,
			error: refreshed.error.message,
		})
	}

	moveTo('authorizing')
	try {
		const code = await authorize(deps, cid)
		moveTo('exchanging')
		const tokens = await deps.client.exchangeCode({
			...deps.credentials,
			code: code.code,
			codeVerifier: code.verifier,
			redirectUri: code.redirectUri,
		})
		persist(deps.store, tokens)
		moveTo('done')
		lifecycleLogger.info('Authorization complete', { cid })
		return tokens.accessToken
	} catch (error: unknown) {
		moveTo('failed')
		lifecycleLogger.error('Authorization failed', { cid, error: toError(error).message })
		throw error
	}
}

/**
 * Capture a refresh as a {@link RefreshResult}; every failure is ignorable.
 */
export async function attemptRefresh(
	deps: Pick<TokenLifecycleDeps, 'client' | 'credentials'>,
	refreshToken: string,
): Promise<RefreshResult> {
	try {
		const tokens = await deps.client.refreshTokens({ ...deps.credentials, refreshToken })
		return { success: true, tokens }
	} catch (error: unknown) {
		return { success: false, category: 'ignorable', error: toError(error) }
	}
}

async function probeCachedToken(client: TokenClient, accessToken: string, cid: string): Promise<boolean> {
	try {
		return await client.isTokenValid(accessToken)
	} catch (error: unknown) {
		lifecycleLogger.warning('Validity probe failed; treating cached token as invalid', {
			cid,
			error: toError(error).message,
		})
		return false
	}
}

interface AuthorizationCode {
	code: string
	verifier: string
	redirectUri: string
}

async function authorize(deps: TokenLifecycleDeps, cid: string): Promise<AuthorizationCode> {
	const pkce = generatePkcePair()
	const expectedState = generateState()
	const start = deps.startListener ?? startCallbackListener

	const listener = await start({
		host: deps.settings.redirect.host,
		port: deps.settings.redirect.port,
		path: deps.settings.redirect.path,
		expectedState,
		timeoutMs: deps.settings.consentTimeoutMs,
	})

	try {
		const authorizationUrl = buildAuthorizationUrl({
			authorizeUrl: deps.settings.endpoints.authorizeUrl,
			clientId: deps.credentials.clientId,
			redirectUri: listener.url,
			scope: deps.settings.scope,
			state: expectedState,
			codeChallenge: pkce.challenge,
		})

		deps.onAuthorizationUrl?.(authorizationUrl)
		try {
			await deps.openBrowser(authorizationUrl)
		} catch (error: unknown) {
			lifecycleLogger.warning('Could not open a browser; waiting for manual navigation', {
				cid,
				error: toError(error).message,
			})
		}

		const outcome = await listener.outcome
		switch (outcome.kind) {
			case 'state_mismatch':
				throw new ProtocolViolationError('Authorization failed: state mismatch', { cid })
			case 'error':
				throw new ProviderError(outcome.reason)
			case 'code':
				return { code: outcome.code, verifier: pkce.verifier, redirectUri: listener.url }
		}
	} finally {
		await listener.close()
	}
}

function persist(store: CredentialStore, tokens: TokenPair): void {
	store.setMany({
		[TOKEN_KEYS.accessToken]: tokens.accessToken,
		[TOKEN_KEYS.refreshToken]: tokens.refreshToken,
	})
}
