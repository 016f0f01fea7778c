/**
 * @module config
 */

export {
	DEFAULT_SETTINGS,
	DEFAULT_STORE_PATH,
	ENV_PREFIX,
	type OAuthSettings,
	redirectUriOf,
	resolveSettings,
} from './settings.ts'
