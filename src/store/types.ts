/**
 * Persistent key-value store for client credentials and tokens.
 *
 * Implementations serialize their own writes. Callers treat
 * read-decide-write sequences as intent, not as transactions.
 */
export interface CredentialStore {
	get(key: string): string | undefined
	set(key: string, value: string): void
	/** Write several keys in one update */
	setMany(entries: Record<string, string>): void
	remove(keys: readonly string[]): void
}

/**
 * Every key this client may store.
 */
export const CREDENTIAL_KEYS = {
	clientId: 'client_id',
	clientSecret: 'client_secret',
	accessToken: 'access_token',
	refreshToken: 'refresh_token',
} as const

export const ALL_CREDENTIAL_KEYS: readonly string[] = Object.values(CREDENTIAL_KEYS)
