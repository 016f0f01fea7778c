/**
 * Timeout utilities for async operations.
 *
 * `withTimeout` races an operation against a timer and clears the timer as
 * soon as either side settles, so a finished operation never keeps the
 * event loop alive. JavaScript has no true cancellation: the losing
 * operation keeps running unless the caller wires an `onTimeout` hook to
 * stop it (closing a server, aborting a request).
 *
 * @module concurrency/timeout
 */

import { StructuredError } from '../errors/structured-error.ts'

/**
 * Error thrown when an operation exceeds its timeout.
 */
export class TimeoutError extends StructuredError {
	constructor(
		message: string,
		public readonly timeoutMs: number,
		context: Record<string, unknown> = {},
	) {
		super(message, 'TIMEOUT', 'OPERATION_TIMED_OUT', true, { timeoutMs, ...context })
		this.name = 'TimeoutError'
	}
}

/**
 * Options for {@link withTimeout}.
 */
export interface WithTimeoutOptions {
	/** Error message (default: "Operation timed out after {timeoutMs}ms") */
	message?: string
	/** Called once when the timer wins the race, before the promise rejects */
	onTimeout?: () => void
	/** Build a domain-specific error instead of the default TimeoutError */
	createError?: (timeoutMs: number) => Error
}

/**
 * Wrap an async operation with a timeout.
 *
 * @param promise - Operation to wait for
 * @param timeoutMs - Maximum time to wait in milliseconds
 * @returns Result of the operation if it settles first
 * @throws {TimeoutError} If the timer fires first (or the error from `createError`)
 *
 * @example
 * ```typescript
 * const outcome = await withTimeout(listener.outcome, 120_000, {
 *   onTimeout: () => listener.close(),
 * });
 * ```
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	options: WithTimeoutOptions = {},
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			options.onTimeout?.()
			reject(
				options.createError
					? options.createError(timeoutMs)
					: new TimeoutError(
							options.message ?? `Operation timed out after ${timeoutMs}ms`,
							timeoutMs,
						),
			)
		}, Math.max(0, timeoutMs))

		promise.then(
			(value) => {
				clearTimeout(timer)
				resolve(value)
			},
			(error: unknown) => {
				clearTimeout(timer)
				reject(error)
			},
		)
	})
}
