/**
 * Client settings: provider endpoints, redirect listener, timeouts and the
 * credential store location.
 *
 * Defaults target the X API v2 OAuth 2.0 endpoints. Each value can be
 * overridden with a `LOOPBACK_PKCE_*` environment variable.
 *
 * @module config/settings
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { StructuredError } from '../errors/index.ts'
import type { OAuthEndpoints } from '../oauth/types.ts'

export const ENV_PREFIX = 'LOOPBACK_PKCE_'

export const DEFAULT_STORE_PATH: string = join(homedir(), '.config', 'loopback-pkce', 'config.json')

export interface OAuthSettings {
	endpoints: OAuthEndpoints
	redirect: {
		host: string
		port: number
		path: string
	}
	/** Space-delimited scopes requested on the consent page */
	scope: string
	tokenTimeoutMs: number
	probeTimeoutMs: number
	/** Unset: wait for the browser callback indefinitely */
	consentTimeoutMs?: number
	storePath: string
	browserCommand?: string
}

export const DEFAULT_SETTINGS: OAuthSettings = {
	endpoints: {
		authorizeUrl: 'https://twitter.com/i/oauth2/authorize',
		tokenUrl: 'https://api.x.com/2/oauth2/token',
		userInfoUrl: 'https://api.x.com/2/users/me',
	},
	redirect: {
		host: 'localhost',
		port: 8000,
		path: '/callback',
	},
	scope: 'tweet.write tweet.read users.read offline.access',
	tokenTimeoutMs: 30_000,
	probeTimeoutMs: 10_000,
	storePath: DEFAULT_STORE_PATH,
}

const positiveInt = z.coerce.number().int().positive()

const EnvSchema = z.object({
	AUTHORIZE_URL: z.string().url().optional(),
	TOKEN_URL: z.string().url().optional(),
	USERINFO_URL: z.string().url().optional(),
	REDIRECT_HOST: z.string().min(1).optional(),
	REDIRECT_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
	REDIRECT_PATH: z.string().startsWith('/').optional(),
	SCOPE: z.string().min(1).optional(),
	TOKEN_TIMEOUT_MS: positiveInt.optional(),
	PROBE_TIMEOUT_MS: positiveInt.optional(),
	CONSENT_TIMEOUT_MS: positiveInt.optional(),
	STORE_PATH: z.string().min(1).optional(),
	BROWSER_COMMAND: z.string().min(1).optional(),
})

/**
 * Redirect URI registered with the provider, e.g. "http://localhost:8000/callback".
 */
export function redirectUriOf(settings: Pick<OAuthSettings, 'redirect'>): string {
	const { host, port, path } = settings.redirect
	return `http://${host}:${port}${path}`
}

/**
 * Build settings from defaults and `LOOPBACK_PKCE_*` environment variables.
 *
 * Empty variables are ignored.
 *
 * @throws {StructuredError} CONFIGURATION / INVALID_SETTING naming each offending variable
 *
 * @example
 * ```typescript
 * const settings = resolveSettings({ LOOPBACK_PKCE_REDIRECT_PORT: "8765" });
 * redirectUriOf(settings); // "http://localhost:8765/callback"
 * ```
 */
export function resolveSettings(env: NodeJS.ProcessEnv = process.env): OAuthSettings {
	const scoped: Record<string, string> = {}
	for (const [name, value] of Object.entries(env)) {
		if (name.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== '') {
			scoped[name.slice(ENV_PREFIX.length)] = value.trim()
		}
	}

	const parsed = EnvSchema.safeParse(scoped)
	if (!parsed.success) {
		const variables = parsed.error.issues.map((issue) => `${ENV_PREFIX}${issue.path.join('.')}`)
		throw new StructuredError(`Invalid configuration: ${variables.join(', ')}`, 'CONFIGURATION', 'INVALID_SETTING', false, {
			variables,
		})
	}

	const overrides = parsed.data
	return {
		endpoints: {
			authorizeUrl: overrides.AUTHORIZE_URL ?? DEFAULT_SETTINGS.endpoints.authorizeUrl,
			tokenUrl: overrides.TOKEN_URL ?? DEFAULT_SETTINGS.endpoints.tokenUrl,
			userInfoUrl: overrides.USERINFO_URL ?? DEFAULT_SETTINGS.endpoints.userInfoUrl,
		},
		redirect: {
			host: overrides.REDIRECT_HOST ?? DEFAULT_SETTINGS.redirect.host,
			port: overrides.REDIRECT_PORT ?? DEFAULT_SETTINGS.redirect.port,
			path: overrides.REDIRECT_PATH ?? DEFAULT_SETTINGS.redirect.path,
		},
		scope: overrides.SCOPE ?? DEFAULT_SETTINGS.scope,
		tokenTimeoutMs: overrides.TOKEN_TIMEOUT_MS ?? DEFAULT_SETTINGS.tokenTimeoutMs,
		probeTimeoutMs: overrides.PROBE_TIMEOUT_MS ?? DEFAULT_SETTINGS.probeTimeoutMs,
		consentTimeoutMs: overrides.CONSENT_TIMEOUT_MS,
		storePath: overrides.STORE_PATH ?? DEFAULT_SETTINGS.storePath,
		browserCommand: overrides.BROWSER_COMMAND,
	}
}
