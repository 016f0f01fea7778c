import { StructuredError } from '../errors/index.ts'
import type { CredentialStore } from './types.ts'

export type PromptFn = (question: string) => Promise<string>

/**
 * Return the stored value for `key`, asking the user when it is missing.
 *
 * The answer is trimmed and saved for next time.
 *
 * @throws {StructuredError} CONFIGURATION / VALUE_REQUIRED on an empty answer
 */
export async function promptIfMissing(
	store: CredentialStore,
	key: string,
	displayName: string,
	prompt: PromptFn,
): Promise<string> {
	const existing = store.get(key)
	if (existing) return existing

	const value = (await prompt(`${displayName}: `)).trim()
	if (!value) {
		throw new StructuredError(`${displayName} is required`, 'CONFIGURATION', 'VALUE_REQUIRED', false, { key })
	}
	store.set(key, value)
	return value
}
