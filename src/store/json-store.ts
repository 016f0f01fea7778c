/**
 * Credential store backed by a JSON file.
 *
 * - Created on first write, parent directory `0o700`
 * - Atomic writes: temp file → rename, file mode `0o600`
 * - Missing, unparsable or non-string-valued files read as empty, but are
 *   never overwritten: writes to such a file throw `CONFIGURATION` / `CORRUPT_STORE`
 *
 * @module store/json-store
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { z } from 'zod'
import { StructuredError } from '../errors/index.ts'
import { storeLogger } from '../logger.ts'
import type { CredentialStore } from './types.ts'

const StoreFileSchema = z.record(z.string())

type StoreFile = { readable: true; data: Record<string, string> } | { readable: false; reason: string }

export class JsonCredentialStore implements CredentialStore {
	constructor(readonly filePath: string) {}

	get(key: string): string | undefined {
		const file = this.read()
		return file.readable ? file.data[key] : undefined
	}

	set(key: string, value: string): void {
		this.setMany({ [key]: value })
	}

	/**
	 * @throws {StructuredError} CONFIGURATION / CORRUPT_STORE when the existing file cannot be parsed
	 */
	setMany(entries: Record<string, string>): void {
		const data = this.readForUpdate()
		Object.assign(data, entries)
		this.write(data)
		storeLogger.debug('Credentials written', { keys: Object.keys(entries) })
	}

	/**
	 * @throws {StructuredError} CONFIGURATION / CORRUPT_STORE when the existing file cannot be parsed
	 */
	remove(keys: readonly string[]): void {
		const data = this.readForUpdate()
		for (const key of keys) {
			delete data[key]
		}
		this.write(data)
		storeLogger.debug('Credentials removed', { keys: [...keys] })
	}

	private readForUpdate(): Record<string, string> {
		const file = this.read()
		if (!file.readable) {
			throw new StructuredError(
				`Credential file ${this.filePath} is unreadable (${file.reason}); fix or delete it before saving credentials`,
				'CONFIGURATION',
				'CORRUPT_STORE',
				false,
				{ filePath: this.filePath },
			)
		}
		return file.data
	}

	private read(): StoreFile {
		if (!fs.existsSync(this.filePath)) {
			return { readable: true, data: {} }
		}

		let raw: unknown
		try {
			raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'))
		} catch (error: unknown) {
			const reason = error instanceof Error ? error.message : String(error)
			storeLogger.warning('Credential file is not valid JSON; treating as empty', { filePath: this.filePath, error: reason })
			return { readable: false, reason: 'not valid JSON' }
		}

		const parsed = StoreFileSchema.safeParse(raw)
		if (!parsed.success) {
			storeLogger.warning('Credential file has an unexpected shape; treating as empty', { filePath: this.filePath })
			return { readable: false, reason: 'expected an object of string values' }
		}
		return { readable: true, data: { ...parsed.data } }
	}

	private write(data: Record<string, string>): void {
		const dir = path.dirname(this.filePath)
		if (!fs.existsSync(dir)) {
			fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
		}

		const tempPath = `${this.filePath}.${process.pid}.tmp`
		fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, { mode: 0o600 })
		fs.renameSync(tempPath, this.filePath)
		fs.chmodSync(this.filePath, 0o600)
	}
}
