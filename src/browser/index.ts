/**
 * Launch the user's browser on a URL.
 *
 * Uses the platform opener (`open` on macOS, `start` on Windows,
 * `xdg-open` elsewhere) unless a command is configured. The child is
 * detached, so this process never waits on the browser.
 *
 * @module browser
 */

import { spawn } from 'node:child_process'

export interface OpenBrowserOptions {
	/** Executable to run instead of the platform opener; receives the URL as its only argument */
	command?: string
	/** Defaults to process.platform */
	platform?: NodeJS.Platform
}

/**
 * Resolve the command and arguments used to open a URL.
 */
export function browserCommandFor(url: string, options: OpenBrowserOptions = {}): { command: string; args: string[] } {
	if (options.command && options.command.trim().length > 0) {
		return { command: options.command.trim(), args: [url] }
	}
	switch (options.platform ?? process.platform) {
		case 'darwin':
			return { command: 'open', args: [url] }
		case 'win32':
			return { command: 'cmd', args: ['/c', 'start', '', url] }
		default:
			return { command: 'xdg-open', args: [url] }
	}
}

/**
 * Open `url` in a browser.
 *
 * Resolves once the opener process has started; rejects if it could not
 * be spawned (e.g. no `xdg-open` on a headless machine).
 */
export function openBrowser(url: string, options: OpenBrowserOptions = {}): Promise<void> {
	const { command, args } = browserCommandFor(url, options)
	return new Promise<void>((resolve, reject) => {
		const child = spawn(command, args, { detached: true, stdio: 'ignore' })
		child.once('error', reject)
		child.once('spawn', () => {
			child.off('error', reject)
			child.unref()
			resolve()
		})
	})
}
