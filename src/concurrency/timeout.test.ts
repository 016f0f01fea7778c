import { describe, expect, test, vi } from 'vitest'
import { StructuredError } from '../errors/structured-error.ts'
import { TimeoutError, withTimeout } from './timeout.ts'

function delay<T>(ms: number, value: T): Promise<T> {
	return new Promise((resolve) => setTimeout(() => resolve(value), ms))
}

function neverResolves(): Promise<never> {
	return new Promise(() => {
		// Never settles
	})
}

describe('TimeoutError', () => {
	test('is a recoverable TIMEOUT StructuredError', () => {
		const error = new TimeoutError('Token request timed out', 30_000, { url: 'https://example.test/token' })

		expect(error).toBeInstanceOf(StructuredError)
		expect(error.name).toBe('TimeoutError')
		expect(error.category).toBe('TIMEOUT')
		expect(error.code).toBe('OPERATION_TIMED_OUT')
		expect(error.recoverable).toBe(true)
		expect(error.timeoutMs).toBe(30_000)
		expect(error.context).toEqual({ timeoutMs: 30_000, url: 'https://example.test/token' })
	})
})

describe('withTimeout', () => {
	test('returns the result when the operation wins', async () => {
		await expect(withTimeout(delay(5, 'done'), 200)).resolves.toBe('done')
	})

	test('rejects with TimeoutError when the timer wins', async () => {
		const result = withTimeout(neverResolves(), 10)

		await expect(result).rejects.toThrow(TimeoutError)
		await expect(result).rejects.toThrow('Operation timed out after 10ms')
	})

	test('uses a custom message', async () => {
		await expect(withTimeout(neverResolves(), 10, { message: 'Consent timed out' })).rejects.toThrow(
			'Consent timed out',
		)
	})

	test('preserves the original rejection', async () => {
		await expect(withTimeout(Promise.reject(new Error('socket closed')), 100)).rejects.toThrow(
			'socket closed',
		)
	})

	test('calls onTimeout exactly once when the timer fires', async () => {
		const onTimeout = vi.fn()

		await expect(withTimeout(neverResolves(), 10, { onTimeout })).rejects.toThrow(TimeoutError)
		expect(onTimeout).toHaveBeenCalledTimes(1)
	})

	test('does not call onTimeout when the operation settles first', async () => {
		const onTimeout = vi.fn()

		await withTimeout(delay(5, 'ok'), 50, { onTimeout })
		await delay(80, undefined)

		expect(onTimeout).not.toHaveBeenCalled()
	})

	test('builds the error with createError', async () => {
		class ConsentError extends Error {}

		await expect(
			withTimeout(neverResolves(), 10, { createError: (ms) => new ConsentError(`gave up after ${ms}`) }),
		).rejects.toThrow('gave up after 10')
	})

	test('clears the timer once the operation settles', async () => {
		vi.useFakeTimers()
		try {
			const pending = withTimeout(Promise.resolve('fast'), 1_000)
			await expect(pending).resolves.toBe('fast')
			expect(vi.getTimerCount()).toBe(0)
		} finally {
			vi.useRealTimers()
		}
	})
})
