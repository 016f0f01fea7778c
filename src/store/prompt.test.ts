import { describe, expect, test, vi } from 'vitest'
import { StructuredError } from '../errors/index.ts'
import { MemoryCredentialStore } from './memory-store.ts'
import { promptIfMissing } from './prompt.ts'

describe('promptIfMissing', () => {
	test('returns the stored value without prompting', async () => {
		const store = new MemoryCredentialStore({ client_id: 'client-123' })
		const prompt = vi.fn(async () => 'unused')

		await expect(promptIfMissing(store, 'client_id', 'Client ID', prompt)).resolves.toBe('client-123')
		expect(prompt).not.toHaveBeenCalled()
	})

	test('prompts, trims and saves a missing value', async () => {
		const store = new MemoryCredentialStore()
		const prompt = vi.fn(async () => '  client-456  ')

		await expect(promptIfMissing(store, 'client_id', 'Client ID', prompt)).resolves.toBe('client-456')
		expect(prompt).toHaveBeenCalledWith('Client ID: ')
		expect(store.get('client_id')).toBe('client-456')
	})

	test('rejects an empty answer without saving', async () => {
		const store = new MemoryCredentialStore()

		const attempt = promptIfMissing(store, 'client_secret', 'Client Secret', async () => '   ')

		await expect(attempt).rejects.toBeInstanceOf(StructuredError)
		await expect(attempt).rejects.toMatchObject({ category: 'CONFIGURATION', code: 'VALUE_REQUIRED' })
		expect(store.writes).toEqual([])
	})
})
