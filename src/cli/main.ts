/**
 * CLI entry point: `tsx src/cli/main.ts <command>`.
 */

import { createInterface } from 'node:readline/promises'
import { openBrowser } from '../browser/index.ts'
import { resolveSettings } from '../config/index.ts'
import { cliLogger, initLogger, logFile } from '../logger.ts'
import { createTokenClient } from '../oauth/token-client.ts'
import { JsonCredentialStore } from '../store/json-store.ts'
import { exitWithFailure, runCommand } from './commands.ts'
import { hasFlag, parseArgs } from './index.ts'

async function ask(question: string): Promise<string> {
	const rl = createInterface({ input: process.stdin, output: process.stdout })
	try {
		return await rl.question(question)
	} finally {
		rl.close()
	}
}

async function main(argv: string[]): Promise<void> {
	const args = parseArgs(argv)
	await initLogger({ console: hasFlag(args.flags, 'verbose') })

	const settings = resolveSettings(process.env)
	cliLogger.debug('Settings resolved', { storePath: settings.storePath, logFile })

	await runCommand(args, {
		settings,
		store: new JsonCredentialStore(settings.storePath),
		client: createTokenClient({
			endpoints: settings.endpoints,
			tokenTimeoutMs: settings.tokenTimeoutMs,
			probeTimeoutMs: settings.probeTimeoutMs,
		}),
		prompt: ask,
		openBrowser: (url) => openBrowser(url, { command: settings.browserCommand }),
		print: (line) => console.log(line),
	})
}

main(process.argv.slice(2)).catch(exitWithFailure)
