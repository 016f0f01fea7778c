/**
 * Structured error base for the OAuth client.
 *
 * Every error the client raises carries:
 * - a category for coarse classification (network, protocol, provider...)
 * - a machine-readable code
 * - a recoverability hint the token lifecycle uses to decide on fallbacks
 * - context metadata (never secrets) and an optional `cause`
 *
 * @module errors/structured-error
 */

/**
 * Error categories used across the client.
 */
export type ErrorCategory =
	| 'NETWORK_ERROR' // Could not reach the provider, or the call failed in transit
	| 'TIMEOUT' // Operation exceeded its time limit
	| 'PROTOCOL' // OAuth protocol violation (state mismatch)
	| 'PROVIDER' // Provider reported an error on the redirect (e.g. access_denied)
	| 'CREDENTIAL' // Provider rejected a code or refresh token
	| 'VALIDATION' // Malformed data
	| 'CONFIGURATION' // Invalid or missing configuration
	| 'INTERNAL'
	| 'UNKNOWN'

/**
 * Structured error with categorization, recoverability, and context.
 *
 * @example
 * ```typescript
 * class StoreError extends StructuredError {
 *   constructor(message: string, context?: Record<string, unknown>) {
 *     super(message, "INTERNAL", "STORE_WRITE_FAILED", false, context);
 *     this.name = "StoreError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/**
	 * High-level error category.
	 */
	public readonly category: ErrorCategory

	/**
	 * Machine-readable error code (e.g., "STATE_MISMATCH", "TOKEN_REQUEST_REJECTED").
	 */
	public readonly code: string

	/**
	 * Whether a caller may fall back or retry after this error.
	 */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize for structured logging.
	 */
	toJSON(): {
		name: string
		message: string
		category: ErrorCategory
		code: string
		recoverable: boolean
		context: Record<string, unknown>
		stack?: string
		cause?: {
			name: string
			message: string
			stack?: string
		}
	} {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * True if error is a StructuredError marked recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}

/**
 * Normalize an unknown thrown value into an Error so it can be chained as a `cause`.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value
	return new Error(typeof value === 'string' ? value : JSON.stringify(value))
}
