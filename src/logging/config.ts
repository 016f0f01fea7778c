/**
 * Logging configuration defaults.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

/** Default log directory, next to the credential store */
export const DEFAULT_LOG_DIR: string = join(homedir(), '.config', 'loopback-pkce', 'logs')

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

export const DEFAULT_LOG_EXTENSION = '.jsonl'

/**
 * Logging level conventions.
 *
 * Note: LogTape uses "warning" not "warn".
 *
 * - DEBUG: state transitions, request/response status codes
 * - INFO: authorization started/completed, token refreshed
 * - WARNING: fallbacks (validity probe failed, refresh rejected, browser launch failed)
 * - ERROR: fatal authorization failures
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

export const DEFAULT_LOG_LEVEL: LogLevel = 'debug'
