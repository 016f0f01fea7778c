/**
 * Correlation IDs link the log entries of one token acquisition run.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character correlation ID.
 *
 * @returns Short hex string (e.g., "a1b2c3d4")
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
