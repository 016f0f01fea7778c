/**
 * Credential persistence.
 *
 * @example
 * ```typescript
 * import { JsonCredentialStore, promptIfMissing } from "loopback-pkce/store";
 *
 * const store = new JsonCredentialStore(settings.storePath);
 * const clientId = await promptIfMissing(store, "client_id", "Client ID", ask);
 * ```
 *
 * @module store
 */

export { JsonCredentialStore } from './json-store.ts'
export { MemoryCredentialStore } from './memory-store.ts'
export { type PromptFn, promptIfMissing } from './prompt.ts'
export { ALL_CREDENTIAL_KEYS, CREDENTIAL_KEYS, type CredentialStore } from './types.ts'
