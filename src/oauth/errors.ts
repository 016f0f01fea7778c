/**
 * OAuth client error taxonomy.
 *
 * | Error | Category | Fatal in the interactive flow |
 * | --- | --- | --- |
 * | TransportError | NETWORK_ERROR / TIMEOUT | yes |
 * | CredentialRejectedError | CREDENTIAL | yes |
 * | ProtocolViolationError | PROTOCOL | always, never retried |
 * | ProviderError | PROVIDER | yes |
 * | ConsentTimeoutError | TIMEOUT | yes |
 *
 * Failures on the refresh path never reach the caller; the lifecycle
 * captures them as an ignorable {@link RefreshResult}.
 *
 * @module oauth/errors
 */

import { type ErrorCategory, StructuredError } from '../errors/index.ts'
import type { TokenPair } from './types.ts'

/**
 * Network or HTTP failure while talking to the provider.
 */
export class TransportError extends StructuredError {
	constructor(
		message: string,
		code: string,
		context: Record<string, unknown> = {},
		cause?: Error,
		category: ErrorCategory = 'NETWORK_ERROR',
	) {
		super(message, category, code, true, context, cause)
		this.name = 'TransportError'
	}
}

/**
 * The token endpoint refused a code or refresh token (expired, revoked,
 * verifier mismatch). Still a transport-class failure for callers.
 */
export class CredentialRejectedError extends TransportError {
	constructor(
		message: string,
		public readonly status: number,
		public readonly providerError: string | undefined,
		context: Record<string, unknown> = {},
	) {
		super(message, 'TOKEN_REQUEST_REJECTED', { status, providerError, ...context }, undefined, 'CREDENTIAL')
		this.name = 'CredentialRejectedError'
	}
}

/**
 * The callback's `state` did not match the attempt's state.
 */
export class ProtocolViolationError extends StructuredError {
	constructor(message = 'Authorization failed: state mismatch', context: Record<string, unknown> = {}) {
		super(message, 'PROTOCOL', 'STATE_MISMATCH', false, context)
		this.name = 'ProtocolViolationError'
	}
}

/**
 * The provider redirected back with an `error` parameter
 * (`access_denied` when the user declines consent).
 */
export class ProviderError extends StructuredError {
	constructor(public readonly reason: string) {
		super(`Authorization failed: ${reason}`, 'PROVIDER', reason === 'access_denied' ? 'USER_DENIED' : 'PROVIDER_ERROR', false, {
			reason,
		})
		this.name = 'ProviderError'
	}
}

/**
 * No callback arrived within the configured consent timeout.
 */
export class ConsentTimeoutError extends StructuredError {
	constructor(public readonly timeoutMs: number) {
		super(`Authorization timed out: no callback within ${Math.round(timeoutMs / 1000)}s`, 'TIMEOUT', 'CONSENT_TIMEOUT', false, {
			timeoutMs,
		})
		this.name = 'ConsentTimeoutError'
	}
}

/**
 * Errors that abort a token run: everything the interactive flow can raise.
 */
export type FatalAuthError =
	| TransportError
	| ProtocolViolationError
	| ProviderError
	| ConsentTimeoutError

export function isFatalAuthError(error: unknown): error is FatalAuthError {
	return (
		error instanceof TransportError ||
		error instanceof ProtocolViolationError ||
		error instanceof ProviderError ||
		error instanceof ConsentTimeoutError
	)
}

/**
 * Outcome of a refresh attempt (discriminated union).
 *
 * Failures are tagged `ignorable`: the lifecycle falls back to full
 * reauthorization for every refresh failure, whatever its cause, so a
 * network outage and a revoked token look the same from outside.
 */
export type RefreshResult =
	| { readonly success: true; readonly tokens: TokenPair }
	| { readonly success: false; readonly category: 'ignorable'; readonly error: Error }
