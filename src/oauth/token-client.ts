/**
 * Token endpoint and validity-probe calls.
 *
 * Every call is single-shot with its own timeout. Nothing here retries;
 * falling back is the lifecycle's job.
 *
 * @module oauth/token-client
 */

import { z } from 'zod'
import { toError } from '../errors/index.ts'
import { tokenLogger } from '../logger.ts'
import { CredentialRejectedError, TransportError } from './errors.ts'
import type { ClientCredentials, OAuthEndpoints, TokenPair } from './types.ts'

/** Default timeout for token endpoint requests */
export const DEFAULT_TOKEN_TIMEOUT_MS = 30_000

/** Default timeout for the validity probe */
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000

const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().min(1),
})

const ErrorResponseSchema = z.object({
	error: z.string().optional(),
	error_description: z.string().optional(),
})

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface HttpOptions {
	timeoutMs?: number
	/** Defaults to the global fetch */
	fetch?: FetchLike
}

export interface ExchangeCodeRequest extends ClientCredentials {
	code: string
	codeVerifier: string
	redirectUri: string
}

export interface RefreshRequest extends ClientCredentials {
	refreshToken: string
}

/**
 * The provider calls the token lifecycle depends on.
 */
export interface TokenClient {
	exchangeCode(request: ExchangeCodeRequest): Promise<TokenPair>
	refreshTokens(request: RefreshRequest): Promise<TokenPair>
	isTokenValid(accessToken: string): Promise<boolean>
}

export interface TokenClientOptions {
	endpoints: Pick<OAuthEndpoints, 'tokenUrl' | 'userInfoUrl'>
	tokenTimeoutMs?: number
	probeTimeoutMs?: number
	fetch?: FetchLike
}

/**
 * Bind the token calls to a provider's endpoints and timeouts.
 */
export function createTokenClient(options: TokenClientOptions): TokenClient {
	const tokenHttp: HttpOptions = {
		timeoutMs: options.tokenTimeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS,
		fetch: options.fetch,
	}
	const probeHttp: HttpOptions = {
		timeoutMs: options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
		fetch: options.fetch,
	}

	return {
		exchangeCode: (request) => exchangeCode(options.endpoints.tokenUrl, request, tokenHttp),
		refreshTokens: (request) => refreshTokens(options.endpoints.tokenUrl, request, tokenHttp),
		isTokenValid: (accessToken) => isTokenValid(options.endpoints.userInfoUrl, accessToken, probeHttp),
	}
}

/**
 * Trade an authorization code (plus the PKCE verifier) for a token pair.
 *
 * @throws {CredentialRejectedError} Non-2xx answer (expired code, verifier mismatch)
 * @throws {TransportError} Network failure, timeout, or a malformed body
 */
export function exchangeCode(tokenUrl: string, request: ExchangeCodeRequest, http: HttpOptions = {}): Promise<TokenPair> {
	return postTokenRequest(
		tokenUrl,
		request,
		new URLSearchParams({
			grant_type: 'authorization_code',
			code: request.code,
			redirect_uri: request.redirectUri,
			code_verifier: request.codeVerifier,
		}),
		http,
	)
}

/**
 * Trade a refresh token for a new token pair.
 *
 * @throws {CredentialRejectedError} Non-2xx answer (revoked or expired refresh token)
 * @throws {TransportError} Network failure, timeout, or a malformed body
 */
export function refreshTokens(tokenUrl: string, request: RefreshRequest, http: HttpOptions = {}): Promise<TokenPair> {
	return postTokenRequest(
		tokenUrl,
		request,
		new URLSearchParams({
			grant_type: 'refresh_token',
			refresh_token: request.refreshToken,
		}),
		http,
	)
}

/**
 * Probe whether the provider currently accepts an access token.
 *
 * @returns true only for HTTP 200
 * @throws {TransportError} Only when the probe itself could not complete
 */
export async function isTokenValid(userInfoUrl: string, accessToken: string, http: HttpOptions = {}): Promise<boolean> {
	const status = await send(
		userInfoUrl,
		{ method: 'GET', headers: { Authorization: `Bearer ${accessToken}` } },
		{ timeoutMs: http.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS, fetch: http.fetch, codePrefix: 'PROBE' },
		async (response) => {
			await response.body?.cancel()
			return response.status
		},
	)
	tokenLogger.debug('Validity probe answered', { status })
	return status === 200
}

async function postTokenRequest(
	tokenUrl: string,
	credentials: ClientCredentials,
	body: URLSearchParams,
	http: HttpOptions,
): Promise<TokenPair> {
	const grantType = body.get('grant_type')
	const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64')

	const response = await send(
		tokenUrl,
		{
			method: 'POST',
			headers: {
				Authorization: `Basic ${basic}`,
				'Content-Type': 'application/x-www-form-urlencoded',
				Accept: 'application/json',
			},
			body: body.toString(),
		},
		{ timeoutMs: http.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS, fetch: http.fetch, codePrefix: 'TOKEN_REQUEST' },
		async (res) => ({ ok: res.ok, status: res.status, text: await res.text() }),
	)

	const { text } = response
	tokenLogger.debug('Token endpoint answered', { grantType, status: response.status })

	if (!response.ok) {
		const detail = ErrorResponseSchema.safeParse(safeJson(text))
		const providerError = detail.success ? detail.data.error : undefined
		const description = detail.success ? detail.data.error_description : undefined
		throw new CredentialRejectedError(
			`Token request rejected (${response.status})${providerError ? `: ${providerError}` : ''}${description ? ` - ${description}` : ''}`,
			response.status,
			providerError,
			{ grantType },
		)
	}

	const parsed = TokenResponseSchema.safeParse(safeJson(text))
	if (!parsed.success) {
		throw new TransportError('Token endpoint returned a malformed response', 'MALFORMED_TOKEN_RESPONSE', {
			grantType,
			status: response.status,
			issues: parsed.error.issues.map((issue) => issue.path.join('.')),
		})
	}

	return {
		accessToken: parsed.data.access_token,
		refreshToken: parsed.data.refresh_token,
	}
}

interface SendOptions {
	timeoutMs: number
	fetch?: FetchLike
	codePrefix: 'TOKEN_REQUEST' | 'PROBE'
}

/**
 * Issue one request and read its response under a single timeout covering
 * both the headers and the body.
 */
async function send<T>(
	url: string,
	init: RequestInit,
	options: SendOptions,
	read: (response: Response) => Promise<T>,
): Promise<T> {
	const fetchImpl = options.fetch ?? fetch
	const controller = new AbortController()
	const timer = setTimeout(() => controller.abort(), options.timeoutMs)
	try {
		const response = await fetchImpl(url, { ...init, signal: controller.signal })
		return await read(response)
	} catch (error: unknown) {
		const cause = toError(error)
		if (controller.signal.aborted) {
			throw new TransportError(
				`Request to ${new URL(url).host} timed out after ${options.timeoutMs}ms`,
				`${options.codePrefix}_TIMEOUT`,
				{ url, timeoutMs: options.timeoutMs },
				cause,
				'TIMEOUT',
			)
		}
		throw new TransportError(
			`Request to ${new URL(url).host} failed: ${cause.message}`,
			`${options.codePrefix}_FAILED`,
			{ url },
			cause,
		)
	} finally {
		clearTimeout(timer)
	}
}

function safeJson(text: string): unknown {
	try {
		return JSON.parse(text)
	} catch {
		return undefined
	}
}
