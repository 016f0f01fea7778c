import type { CredentialStore } from './types.ts'

/**
 * In-memory store for tests and embedders that persist elsewhere.
 * Records every write so callers can assert on write-through behavior.
 */
export class MemoryCredentialStore implements CredentialStore {
	private readonly data = new Map<string, string>()
	readonly writes: Array<Record<string, string>> = []

	constructor(initial: Record<string, string> = {}) {
		for (const [key, value] of Object.entries(initial)) {
			this.data.set(key, value)
		}
	}

	get(key: string): string | undefined {
		return this.data.get(key)
	}

	set(key: string, value: string): void {
		this.setMany({ [key]: value })
	}

	setMany(entries: Record<string, string>): void {
		this.writes.push({ ...entries })
		for (const [key, value] of Object.entries(entries)) {
			this.data.set(key, value)
		}
	}

	remove(keys: readonly string[]): void {
		for (const key of keys) {
			this.data.delete(key)
		}
	}

	snapshot(): Record<string, string> {
		return Object.fromEntries(this.data)
	}
}
