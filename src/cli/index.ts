/**
 * Lightweight CLI argument parsing and error output.
 *
 * - Three-format flag parsing (--flag value, --flag=value, --flag)
 * - Typed flag accessors
 * - A single fatal-error exit path
 */

import { StructuredError } from '../errors/index.ts'

export type FlagValue = string | boolean | (string | boolean)[]
export type Flags = Record<string, FlagValue>

export interface ParsedArgs {
	command: string
	positional: string[]
	flags: Flags
}

/**
 * Parse command-line arguments into structured format.
 *
 * Handles three flag formats:
 * - `--key value` (spaced syntax)
 * - `--key=value` (equals syntax)
 * - `--key` (boolean flag)
 *
 * Duplicate flags are stored as arrays:
 * - `--scope a --scope b` → flags.scope = ["a", "b"]
 *
 * @example
 * parseArgs(["login", "--consent-timeout", "120"])
 * // → { command: "login", positional: [], flags: { "consent-timeout": "120" } }
 *
 * @example
 * parseArgs(["login", "--reset-auth"])
 * // → { command: "login", positional: [], flags: { "reset-auth": true } }
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const positional: string[] = []
	const flags: Flags = {}

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]
		if (!arg) continue
		if (!arg.startsWith('--')) {
			positional.push(arg)
			continue
		}

		const eq = arg.indexOf('=')
		const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
		if (!key) continue
		const next = argv[i + 1]

		const setValue = (newValue: string | boolean) => {
			const existing = flags[key]
			if (existing === undefined) {
				flags[key] = newValue
			} else if (Array.isArray(existing)) {
				existing.push(newValue)
			} else {
				flags[key] = [existing, newValue]
			}
		}

		if (eq !== -1) {
			setValue(arg.slice(eq + 1))
		} else if (next && !next.startsWith('--') && !BOOLEAN_FLAGS.has(key)) {
			setValue(next)
			i++
		} else {
			setValue(true)
		}
	}

	const [command, ...rest] = positional
	return { command: command ?? '', positional: rest, flags }
}

/** Flags that never take a value, so `--reset-auth login` still reads `login` as the command */
const BOOLEAN_FLAGS = new Set(['reset-auth', 'verbose', 'help'])

/**
 * First string value of a flag, or undefined for boolean/missing flags.
 *
 * @example
 * getStringFlag(parseArgs(["--consent-timeout", "120"]).flags, "consent-timeout") // → "120"
 * getStringFlag(parseArgs(["--verbose"]).flags, "verbose") // → undefined
 */
export function getStringFlag(flags: Flags, key: string): string | undefined {
	const value = flags[key]
	if (typeof value === 'string') return value
	if (Array.isArray(value)) {
		return value.find((v): v is string => typeof v === 'string')
	}
	return undefined
}

/**
 * True when the flag was passed at all, with or without a value.
 */
export function hasFlag(flags: Flags, key: string): boolean {
	return flags[key] !== undefined
}

/**
 * Parse a flag as a positive integer.
 *
 * @returns undefined when the flag is absent
 * @throws {StructuredError} VALIDATION / INVALID_FLAG when present but not a positive integer
 */
export function getPositiveIntFlag(flags: Flags, key: string): number | undefined {
	if (!hasFlag(flags, key)) return undefined
	const raw = getStringFlag(flags, key)
	const value = raw === undefined ? Number.NaN : Number(raw)
	if (!Number.isInteger(value) || value <= 0) {
		throw new StructuredError(
			`--${key} expects a positive whole number, got ${raw ?? 'nothing'}`,
			'VALIDATION',
			'INVALID_FLAG',
			false,
			{ flag: key },
		)
	}
	return value
}

/**
 * Print an error to stderr and exit with code 1.
 *
 * Only the message (and optional details) are printed; never a stack trace.
 *
 * @example
 * outputError("Authorization failed: state mismatch");
 */
export function outputError(message: string, details?: Record<string, unknown>): never {
	console.error(`Error: ${message}`)
	if (details) {
		console.error(JSON.stringify(details, null, 2))
	}
	process.exit(1)
}
