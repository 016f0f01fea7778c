import { afterEach, describe, expect, test, vi } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { getPositiveIntFlag, getStringFlag, hasFlag, outputError, parseArgs } from './index.ts'

describe('parseArgs', () => {
	test('parses the command and positional args', () => {
		const result = parseArgs(['login', 'extra'])
		expect(result.command).toBe('login')
		expect(result.positional).toEqual(['extra'])
		expect(result.flags).toEqual({})
	})

	test('parses --flag value (spaced) format', () => {
		const result = parseArgs(['login', '--consent-timeout', '120'])
		expect(result.flags['consent-timeout']).toBe('120')
	})

	test('parses --flag=value (equals) format and keeps later equals signs', () => {
		const result = parseArgs(['login', '--note=a=b'])
		expect(result.flags.note).toBe('a=b')
	})

	test('parses boolean flags', () => {
		const result = parseArgs(['login', '--reset-auth'])
		expect(result.flags['reset-auth']).toBe(true)
	})

	test('known boolean flags never swallow the next argument', () => {
		const result = parseArgs(['--reset-auth', 'login'])
		expect(result.command).toBe('login')
		expect(result.flags['reset-auth']).toBe(true)
	})

	test('stores duplicate flags as arrays', () => {
		const result = parseArgs(['login', '--scope', 'a', '--scope', 'b'])
		expect(result.flags.scope).toEqual(['a', 'b'])
	})

	test('handles empty args', () => {
		expect(parseArgs([])).toEqual({ command: '', positional: [], flags: {} })
	})
})

describe('getStringFlag', () => {
	test('returns string values', () => {
		expect(getStringFlag({ mode: 'x' }, 'mode')).toBe('x')
	})

	test('returns undefined for boolean flags', () => {
		expect(getStringFlag({ verbose: true }, 'verbose')).toBeUndefined()
	})

	test('returns the first string of an array', () => {
		expect(getStringFlag({ arg: [true, 'a', 'b'] }, 'arg')).toBe('a')
	})
})

describe('hasFlag', () => {
	test('is true for boolean and valued flags', () => {
		expect(hasFlag({ verbose: true, mode: 'x' }, 'verbose')).toBe(true)
		expect(hasFlag({ verbose: true, mode: 'x' }, 'mode')).toBe(true)
		expect(hasFlag({}, 'verbose')).toBe(false)
	})
})

describe('getPositiveIntFlag', () => {
	test('returns undefined when absent', () => {
		expect(getPositiveIntFlag({}, 'consent-timeout')).toBeUndefined()
	})

	test('parses a positive integer', () => {
		expect(getPositiveIntFlag({ 'consent-timeout': '120' }, 'consent-timeout')).toBe(120)
	})

	test.each([['0'], ['-5'], ['1.5'], ['soon']])('rejects %s', (raw) => {
		expect(() => getPositiveIntFlag({ 'consent-timeout': raw }, 'consent-timeout')).toThrow(
			`--consent-timeout expects a positive whole number, got ${raw}`,
		)
	})

	test('rejects a flag given without a value', () => {
		try {
			getPositiveIntFlag({ 'consent-timeout': true }, 'consent-timeout')
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(StructuredError)
			expect(error).toMatchObject({
				category: 'VALIDATION',
				code: 'INVALID_FLAG',
				message: '--consent-timeout expects a positive whole number, got nothing',
			})
		}
	})
})

describe('outputError', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	test('prints the message to stderr and exits with code 1', () => {
		const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
		const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
			throw new Error(`exit ${String(code)}`)
		})

		expect(() => outputError('Authorization failed: state mismatch')).toThrow('exit 1')
		expect(exitSpy).toHaveBeenCalledWith(1)
		expect(errorSpy).toHaveBeenCalledTimes(1)
		expect(errorSpy).toHaveBeenCalledWith('Error: Authorization failed: state mismatch')
	})

	test('prints details as indented JSON', () => {
		const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
		vi.spyOn(process, 'exit').mockImplementation((code) => {
			throw new Error(`exit ${String(code)}`)
		})

		expect(() => outputError('Unknown command: frob', { command: 'frob' })).toThrow('exit 1')
		expect(errorSpy).toHaveBeenLastCalledWith('{\n  "command": "frob"\n}')
	})
})
