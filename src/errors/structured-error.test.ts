import { describe, expect, test } from 'vitest'
import {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	toError,
} from './structured-error.ts'

describe('StructuredError', () => {
	test('creates error with all properties', () => {
		const error = new StructuredError(
			'Token request rejected',
			'CREDENTIAL',
			'TOKEN_REQUEST_REJECTED',
			true,
			{ status: 400, grantType: 'refresh_token' },
		)

		expect(error).toBeInstanceOf(Error)
		expect(error).toBeInstanceOf(StructuredError)
		expect(error.message).toBe('Token request rejected')
		expect(error.category).toBe('CREDENTIAL')
		expect(error.code).toBe('TOKEN_REQUEST_REJECTED')
		expect(error.recoverable).toBe(true)
		expect(error.context).toEqual({ status: 400, grantType: 'refresh_token' })
		expect(error.name).toBe('StructuredError')
		expect(error.stack).toBeDefined()
	})

	test('defaults context to empty and cause to undefined', () => {
		const error = new StructuredError('Minimal', 'INTERNAL', 'MINIMAL', false)

		expect(error.context).toEqual({})
		expect(error.cause).toBeUndefined()
	})

	test('chains the cause', () => {
		const original = new Error('socket hang up')
		const wrapped = new StructuredError(
			'Token endpoint unreachable',
			'NETWORK_ERROR',
			'TOKEN_REQUEST_FAILED',
			true,
			{},
			original,
		)

		expect(wrapped.cause).toBe(original)
	})

	test('serializes to JSON', () => {
		const error = new StructuredError('State mismatch', 'PROTOCOL', 'STATE_MISMATCH', false, {
			path: '/callback',
		})

		const json = error.toJSON()

		expect(json).toMatchObject({
			name: 'StructuredError',
			message: 'State mismatch',
			category: 'PROTOCOL',
			code: 'STATE_MISMATCH',
			recoverable: false,
			context: { path: '/callback' },
		})
		expect(json.cause).toBeUndefined()
	})

	test('serializes the cause', () => {
		const error = new StructuredError(
			'Wrapped',
			'NETWORK_ERROR',
			'WRAPPED',
			true,
			{},
			new Error('ECONNRESET'),
		)

		expect(error.toJSON().cause).toMatchObject({ name: 'Error', message: 'ECONNRESET' })
	})

	test('accepts every category', () => {
		const categories: ErrorCategory[] = [
			'NETWORK_ERROR',
			'TIMEOUT',
			'PROTOCOL',
			'PROVIDER',
			'CREDENTIAL',
			'VALIDATION',
			'CONFIGURATION',
			'INTERNAL',
			'UNKNOWN',
		]

		for (const category of categories) {
			expect(new StructuredError('x', category, 'X', false).category).toBe(category)
		}
	})

	test('works with subclasses', () => {
		class StoreError extends StructuredError {
			constructor(message: string) {
				super(message, 'INTERNAL', 'STORE_WRITE_FAILED', false)
				this.name = 'StoreError'
			}
		}

		const error = new StoreError('disk full')

		expect(error).toBeInstanceOf(StructuredError)
		expect(error.name).toBe('StoreError')
		expect(error.toJSON().name).toBe('StoreError')
	})
})

describe('isStructuredError', () => {
	test('recognizes instances and rejects everything else', () => {
		expect(isStructuredError(new StructuredError('x', 'INTERNAL', 'X', false))).toBe(true)
		expect(isStructuredError(new Error('plain'))).toBe(false)
		expect(isStructuredError(null)).toBe(false)
		expect(isStructuredError({ category: 'INTERNAL' })).toBe(false)
	})
})

describe('isRecoverableError', () => {
	test('follows the recoverable flag', () => {
		expect(isRecoverableError(new StructuredError('x', 'TIMEOUT', 'X', true))).toBe(true)
		expect(isRecoverableError(new StructuredError('x', 'PROTOCOL', 'X', false))).toBe(false)
		expect(isRecoverableError(new Error('plain'))).toBe(false)
		expect(isRecoverableError(undefined)).toBe(false)
	})
})

describe('toError', () => {
	test('returns Error instances unchanged', () => {
		const error = new TypeError('fetch failed')
		expect(toError(error)).toBe(error)
	})

	test('wraps strings and other values', () => {
		expect(toError('boom').message).toBe('boom')
		expect(toError({ code: 1 }).message).toBe('{"code":1}')
	})
})
