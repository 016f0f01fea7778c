/**
 * CLI commands: `login`, `status`, `logout`, `reset-keys`, `help`.
 *
 * Commands take every collaborator through {@link CliContext}; `main.ts`
 * wires the real store, token client, prompt and browser.
 *
 * @module cli/commands
 */

import { type OAuthSettings, redirectUriOf } from '../config/settings.ts'
import { isStructuredError, StructuredError, toError } from '../errors/index.ts'
import { cliLogger } from '../logger.ts'
import type { CallbackListener, CallbackListenerOptions } from '../oauth/callback-listener.ts'
import { isFatalAuthError } from '../oauth/errors.ts'
import { ensureAccessToken } from '../oauth/lifecycle.ts'
import type { TokenClient } from '../oauth/token-client.ts'
import { TOKEN_KEYS } from '../oauth/types.ts'
import { type PromptFn, promptIfMissing } from '../store/prompt.ts'
import { ALL_CREDENTIAL_KEYS, CREDENTIAL_KEYS, type CredentialStore } from '../store/types.ts'
import { getPositiveIntFlag, hasFlag, outputError, type ParsedArgs } from './index.ts'

export interface CliContext {
	settings: OAuthSettings
	store: CredentialStore
	client: TokenClient
	prompt: PromptFn
	openBrowser: (url: string) => Promise<void>
	/** Writes one line to stdout */
	print: (line: string) => void
	startListener?: (options: CallbackListenerOptions) => Promise<CallbackListener>
}

export const USAGE = `Usage: loopback-pkce <command> [options]

Commands:
  login               Obtain an access token, reusing or refreshing cached tokens
    --reset-auth        Discard cached tokens and authorize again
    --consent-timeout N Give up if the browser has not called back within N seconds
  status              Show the redirect URI to register, which credentials are stored
                      and whether the token is accepted
  logout              Remove the cached access and refresh tokens
  reset-keys          Remove every stored credential, including the client id and secret
  help                Show this message

Options:
  --verbose           Also log to the console`

/**
 * Run one parsed command line.
 *
 * @throws {StructuredError} VALIDATION / UNKNOWN_COMMAND for anything not listed in {@link USAGE}
 */
export async function runCommand(args: ParsedArgs, ctx: CliContext): Promise<void> {
	cliLogger.debug('Running command', { command: args.command || 'help' })
	if (hasFlag(args.flags, 'help')) {
		ctx.print(USAGE)
		return
	}
	switch (args.command) {
		case 'login':
			return login(args, ctx)
		case 'status':
			return status(ctx)
		case 'logout':
			ctx.store.remove([TOKEN_KEYS.accessToken, TOKEN_KEYS.refreshToken])
			ctx.print('Cached tokens removed.')
			return
		case 'reset-keys':
			ctx.store.remove(ALL_CREDENTIAL_KEYS)
			ctx.print('All stored credentials removed.')
			return
		case '':
		case 'help':
			ctx.print(USAGE)
			return
		default:
			ctx.print(USAGE)
			throw new StructuredError(`Unknown command: ${args.command}`, 'VALIDATION', 'UNKNOWN_COMMAND', false, {
				command: args.command,
			})
	}
}

async function login(args: ParsedArgs, ctx: CliContext): Promise<void> {
	const consentTimeoutSec = getPositiveIntFlag(args.flags, 'consent-timeout')
	const resetAuth = hasFlag(args.flags, 'reset-auth')

	if (resetAuth) {
		ctx.store.remove([TOKEN_KEYS.accessToken, TOKEN_KEYS.refreshToken])
	}

	const clientId = await promptIfMissing(ctx.store, CREDENTIAL_KEYS.clientId, 'Client ID', ctx.prompt)
	const clientSecret = await promptIfMissing(ctx.store, CREDENTIAL_KEYS.clientSecret, 'Client Secret', ctx.prompt)

	await ensureAccessToken(
		{
			store: ctx.store,
			client: ctx.client,
			credentials: { clientId, clientSecret },
			settings: {
				...ctx.settings,
				consentTimeoutMs: consentTimeoutSec === undefined ? ctx.settings.consentTimeoutMs : consentTimeoutSec * 1000,
			},
			openBrowser: ctx.openBrowser,
			onAuthorizationUrl: (url) => ctx.print(`Opening your browser to authorize. If it does not open, visit:\n${url}`),
			startListener: ctx.startListener,
		},
		{ force: resetAuth },
	)

	ctx.print('Authentication successful.')
}

async function status(ctx: CliContext): Promise<void> {
	const stored = (key: string) => (ctx.store.get(key) ? 'stored' : 'missing')

	ctx.print(`Redirect URI:  ${redirectUriOf(ctx.settings)}`)
	ctx.print(`Client ID:     ${stored(CREDENTIAL_KEYS.clientId)}`)
	ctx.print(`Client secret: ${stored(CREDENTIAL_KEYS.clientSecret)}`)
	ctx.print(`Refresh token: ${stored(CREDENTIAL_KEYS.refreshToken)}`)

	const accessToken = ctx.store.get(CREDENTIAL_KEYS.accessToken)
	if (!accessToken) {
		ctx.print('Access token:  missing')
		return
	}

	try {
		const valid = await ctx.client.isTokenValid(accessToken)
		ctx.print(`Access token:  ${valid ? 'valid' : 'rejected by the provider'}`)
	} catch (error: unknown) {
		const message = toError(error).message
		cliLogger.warning('Validity probe failed during status', { error: message })
		ctx.print(`Access token:  could not be checked (${message})`)
	}
}

/**
 * Log properties for a failed command.
 *
 * Authorization failures and other classified errors are expected
 * outcomes: category and code only. Anything else is a defect and keeps
 * its stack.
 */
export function failureLogProperties(error: unknown): Record<string, unknown> {
	const err = toError(error)
	if (isFatalAuthError(err)) {
		return { kind: 'authorization', error: err.message, category: err.category, code: err.code }
	}
	if (isStructuredError(err)) {
		return { kind: 'usage', error: err.message, category: err.category, code: err.code }
	}
	return { kind: 'unexpected', error: err.message, stack: err.stack }
}

/**
 * Log a failed command and exit 1 with a one-line diagnostic on stderr.
 */
export function exitWithFailure(error: unknown): never {
	const properties = failureLogProperties(error)
	if (properties.kind === 'unexpected') {
		cliLogger.fatal('Command failed unexpectedly', properties)
	} else {
		cliLogger.error('Command failed', properties)
	}
	outputError(toError(error).message)
}
