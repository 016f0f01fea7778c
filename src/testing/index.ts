/**
 * Test fixtures: temp directories and an in-process HTTP stand-in for the
 * OAuth provider.
 *
 * @example
 * ```ts
 * const provider = await startStubServer((req, res) => {
 *   res.writeHead(200, { "Content-Type": "application/json" });
 *   res.end(JSON.stringify({ access_token: "a1", refresh_token: "r1" }));
 * });
 * // ... point the token client at `${provider.baseUrl}/token`
 * await provider.close();
 * ```
 */

import fs from 'node:fs'
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http'
import os from 'node:os'
import path from 'node:path'

/**
 * Create a temporary directory with a given prefix.
 *
 * @returns Absolute path to the created directory
 */
export function createTempDir(prefix = 'test-'): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

/**
 * Remove a test directory and all its contents.
 */
export function cleanupTestDir(dir: string): void {
	fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * A request the stub server received, with its body already read.
 */
export interface RecordedRequest {
	method: string
	url: string
	headers: IncomingMessage['headers']
	body: string
}

export type StubHandler = (request: RecordedRequest, res: ServerResponse) => void

export interface StubServer {
	/** e.g. "http://127.0.0.1:53211" */
	baseUrl: string
	/** Every request received, in arrival order */
	requests: RecordedRequest[]
	close: () => Promise<void>
}

/**
 * Start an HTTP server on an ephemeral loopback port that records each
 * request and answers through `handler`.
 */
export async function startStubServer(handler: StubHandler): Promise<StubServer> {
	const requests: RecordedRequest[] = []

	const server = createServer((req, res) => {
		const chunks: Buffer[] = []
		req.on('data', (chunk: Buffer) => chunks.push(chunk))
		req.on('end', () => {
			const recorded: RecordedRequest = {
				method: req.method ?? 'GET',
				url: req.url ?? '/',
				headers: req.headers,
				body: Buffer.concat(chunks).toString('utf8'),
			}
			requests.push(recorded)
			handler(recorded, res)
		})
	})

	await new Promise<void>((resolve, reject) => {
		server.once('error', reject)
		server.listen(0, '127.0.0.1', () => {
			server.off('error', reject)
			resolve()
		})
	})

	const address = server.address()
	if (address === null || typeof address === 'string') {
		throw new Error('Stub server is not listening on a TCP port')
	}
	const { port } = address

	return {
		baseUrl: `http://127.0.0.1:${port}`,
		requests,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.closeAllConnections()
				server.close((error) => (error ? reject(error) : resolve()))
			}),
	}
}

/**
 * Reply with a JSON body.
 */
export function sendJson(res: ServerResponse, status: number, body: unknown): void {
	res.writeHead(status, { 'Content-Type': 'application/json' })
	res.end(JSON.stringify(body))
}
