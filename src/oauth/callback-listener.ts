/**
 * Single-use loopback listener for the authorization redirect.
 *
 * `startCallbackListener` resolves only once the server is bound; that
 * resolution is the "ready" signal the caller awaits before opening the
 * browser. The first request to the callback path produces the one
 * {@link CallbackOutcome}, delivered through a {@link OneShot}; the server
 * then shuts down after the response has been flushed.
 *
 * @module oauth/callback-listener
 */

import { timingSafeEqual } from 'node:crypto'
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http'
import { OneShot } from '../concurrency/one-shot.ts'
import { withTimeout } from '../concurrency/timeout.ts'
import { toError } from '../errors/index.ts'
import { listenerLogger } from '../logger.ts'
import { ConsentTimeoutError, TransportError } from './errors.ts'
import type { CallbackOutcome } from './types.ts'

export const DEFAULT_CALLBACK_PATH = '/callback'

export interface CallbackListenerOptions {
	/** Loopback host to bind, e.g. "localhost" or "127.0.0.1" */
	host: string
	/** Fixed port registered with the provider; 0 picks an ephemeral port */
	port: number
	path?: string
	/** State generated for this attempt */
	expectedState: string
	/**
	 * Give up waiting for the browser after this many milliseconds.
	 * Unset means wait until the process is terminated.
	 */
	timeoutMs?: number
}

export interface CallbackListener {
	/** Redirect URI served by this listener, with the bound port */
	url: string
	port: number
	/** Settles exactly once per listener */
	outcome: Promise<CallbackOutcome>
	/** Stop listening. Rejects a still-pending outcome. Idempotent. */
	close: () => Promise<void>
}

/**
 * Compare the received state against the expected one without leaking
 * the position of the first differing byte.
 */
export function stateMatches(expected: string, received: string | null): boolean {
	if (received === null) return false
	const a = Buffer.from(expected, 'utf8')
	const b = Buffer.from(received, 'utf8')
	return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * Map the redirect's query parameters to an outcome.
 */
export function resolveCallbackOutcome(params: URLSearchParams, expectedState: string): CallbackOutcome {
	if (!stateMatches(expectedState, params.get('state'))) {
		return { kind: 'state_mismatch' }
	}
	const code = params.get('code')
	if (code) {
		return { kind: 'code', code }
	}
	return { kind: 'error', reason: params.get('error') || 'unknown' }
}

/**
 * Bind the listener and resolve once it accepts connections.
 *
 * @throws {TransportError} `LISTENER_BIND_FAILED` when the port is taken; there is no queueing behind another attempt
 *
 * @example
 * ```typescript
 * const listener = await startCallbackListener({ host: "localhost", port: 8000, expectedState: state });
 * await openBrowser(authorizationUrl);
 * const outcome = await listener.outcome;
 * ```
 */
export async function startCallbackListener(options: CallbackListenerOptions): Promise<CallbackListener> {
	const path = options.path ?? DEFAULT_CALLBACK_PATH
	const channel = new OneShot<CallbackOutcome>()
	let closing: Promise<void> | undefined

	const server = createServer((req, res) => {
		handleRequest(req, res)
	})

	function handleRequest(req: IncomingMessage, res: ServerResponse): void {
		const requestUrl = new URL(req.url ?? '/', 'http://loopback.invalid')

		if (req.method !== 'GET' || requestUrl.pathname !== path) {
			respond(res, 404, 'Not found.')
			return
		}

		if (channel.isSettled) {
			respond(res, 410, 'This authorization request has already been handled.')
			return
		}

		const outcome = resolveCallbackOutcome(requestUrl.searchParams, options.expectedState)
		channel.send(outcome)
		listenerLogger.info('Callback received', { outcome: outcome.kind })

		switch (outcome.kind) {
			case 'code':
				respond(res, 200, 'Authorization successful! You can close this tab.', () => void close())
				break
			case 'state_mismatch':
				respond(res, 400, 'Authorization failed: state mismatch.', () => void close())
				break
			case 'error':
				respond(res, 400, `Authorization failed: ${outcome.reason}`, () => void close())
				break
		}
	}

	function close(): Promise<void> {
		if (!closing) {
			channel.fail(new TransportError('Callback listener closed before a callback arrived', 'LISTENER_CLOSED'))
			closing = new Promise<void>((resolve) => {
				server.close((error) => {
					if (error) {
						listenerLogger.debug('Callback listener was not running at close', { error: error.message })
					}
					listenerLogger.debug('Callback listener closed')
					resolve()
				})
				server.closeIdleConnections()
			})
		}
		return closing
	}

	await new Promise<void>((resolve, reject) => {
		const onError = (error: Error) => {
			reject(
				new TransportError(
					`Could not start callback listener on ${options.host}:${options.port}: ${error.message}`,
					'LISTENER_BIND_FAILED',
					{ host: options.host, port: options.port },
					toError(error),
				),
			)
		}
		server.once('error', onError)
		server.listen(options.port, options.host, () => {
			server.off('error', onError)
			resolve()
		})
	})

	server.on('error', (error) => {
		listenerLogger.warning('Callback listener error', { error: error.message })
	})

	const address = server.address()
	if (address === null || typeof address === 'string') {
		await close()
		throw new TransportError('Callback listener is not bound to a TCP port', 'LISTENER_BIND_FAILED', {
			host: options.host,
		})
	}

	const url = `http://${options.host}:${address.port}${path}`
	listenerLogger.info('Callback listener ready', { url })

	const outcome =
		options.timeoutMs === undefined
			? channel.received
			: withTimeout(channel.received, options.timeoutMs, {
					onTimeout: () => void close(),
					createError: (timeoutMs) => new ConsentTimeoutError(timeoutMs),
				})
	// Callers that abandon the attempt close the listener without awaiting the outcome
	outcome.catch(() => undefined)

	return { url, port: address.port, outcome, close }
}

function respond(res: ServerResponse, status: number, message: string, onFlushed?: () => void): void {
	const title = status === 200 ? 'Authorization complete' : 'Authorization'
	const body = `<!doctype html><html><head><meta charset="utf-8"><title>${title}</title></head><body><h2>${escapeHtml(message)}</h2></body></html>`
	res.writeHead(status, {
		'Content-Type': 'text/html; charset=utf-8',
		'Content-Length': Buffer.byteLength(body),
		Connection: 'close',
	})
	res.end(body, onFlushed)
}

/**
 * Escape text reflected into the result page.
 */
export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&#39;')
}
