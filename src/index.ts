/**
 * loopback-pkce
 *
 * OAuth 2.0 Authorization Code + PKCE client for command-line tools: a
 * loopback redirect listener, token exchange and refresh, and a persisted
 * token lifecycle.
 *
 * Import from subpath exports for narrower surfaces:
 *   import { ensureAccessToken } from "loopback-pkce/oauth";
 *   import { JsonCredentialStore } from "loopback-pkce/store";
 *
 * @packageDocumentation
 */

export { openBrowser } from './browser/index.ts'
export { type OAuthSettings, resolveSettings } from './config/index.ts'
export { StructuredError } from './errors/index.ts'
export * from './oauth/index.ts'
export { type CredentialStore, JsonCredentialStore, MemoryCredentialStore, promptIfMissing } from './store/index.ts'

export const VERSION = '0.1.0'
