import { describe, expect, test } from 'vitest'
import { buildAuthorizationUrl } from './authorization-url.ts'

const BASE = {
	authorizeUrl: 'https://provider.example/i/oauth2/authorize',
	clientId: 'client-123',
	redirectUri: 'http://localhost:8000/callback',
	scope: 'tweet.read users.read offline.access',
	state: 'state-abc',
	codeChallenge: 'challenge-xyz',
}

describe('buildAuthorizationUrl', () => {
	test('encodes every parameter in order', () => {
		expect(buildAuthorizationUrl(BASE)).toBe(
			'https://provider.example/i/oauth2/authorize' +
				'?response_type=code' +
				'&client_id=client-123' +
				'&redirect_uri=http%3A%2F%2Flocalhost%3A8000%2Fcallback' +
				'&scope=tweet.read+users.read+offline.access' +
				'&state=state-abc' +
				'&code_challenge=challenge-xyz' +
				'&code_challenge_method=S256',
		)
	})

	test('round-trips through URLSearchParams', () => {
		const url = new URL(buildAuthorizationUrl(BASE))

		expect(url.searchParams.get('response_type')).toBe('code')
		expect(url.searchParams.get('redirect_uri')).toBe('http://localhost:8000/callback')
		expect(url.searchParams.get('scope')).toBe('tweet.read users.read offline.access')
		expect(url.searchParams.get('code_challenge_method')).toBe('S256')
	})

	test('keeps query parameters already on the endpoint', () => {
		const url = buildAuthorizationUrl({ ...BASE, authorizeUrl: 'https://provider.example/authorize?prompt=consent' })

		expect(url.startsWith('https://provider.example/authorize?prompt=consent&response_type=code&')).toBe(true)
	})
})
