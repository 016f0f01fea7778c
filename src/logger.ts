/**
 * Loggers shared by every module of the client.
 *
 * Records are no-ops until `initLogger()` runs (the CLI calls it at
 * startup), so library consumers and tests that never initialize logging
 * pay nothing.
 */

import { createAppLogger } from './logging/index.ts'

const { initLogger, createCorrelationId, getSubsystemLogger, logFile } = createAppLogger({
	name: 'loopback-pkce',
})

export { createCorrelationId, initLogger, logFile }
export const listenerLogger = getSubsystemLogger('listener')
export const tokenLogger = getSubsystemLogger('token')
export const lifecycleLogger = getSubsystemLogger('lifecycle')
export const storeLogger = getSubsystemLogger('store')
export const cliLogger = getSubsystemLogger('cli')
