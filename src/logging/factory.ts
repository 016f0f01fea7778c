/**
 * Application logger factory.
 *
 * Creates configured LogTape loggers with:
 * - JSONL file output with rotation
 * - Hierarchical categories for subsystem filtering
 * - An optional console sink for `--verbose` CLI runs
 */

import { existsSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getConsoleSink,
	getLogger,
	jsonLinesFormatter,
	type Logger,
	type Sink,
	withFilter,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from './config.ts'
import { createCorrelationId } from './correlation.ts'

export interface AppLoggerOptions {
	/** Root category and default log file name. Should be kebab-case. */
	name: string

	/**
	 * Subsystem names for hierarchical loggers.
	 *
	 * @example ["listener", "token"] → loggers for ["loopback-pkce", "listener"], etc.
	 */
	subsystems?: string[]

	/** Log directory. Defaults to ~/.config/loopback-pkce/logs/ */
	logDir?: string

	/** Log file name without extension. Defaults to `name`. */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest level captured by the file sink. Defaults to "debug". */
	lowestLevel?: LogLevel
}

export interface InitLoggerOptions {
	/** Also write records to the console (stderr-friendly CLI diagnostics) */
	console?: boolean
	/** Lowest level for the console sink. Defaults to "info". */
	consoleLevel?: LogLevel
}

export interface AppLogger {
	/**
	 * Initialize the logging system. Must be called before records reach a sink.
	 * Safe to call multiple times; only the first call configures LogTape.
	 */
	initLogger: (options?: InitLoggerOptions) => Promise<void>

	createCorrelationId: typeof createCorrelationId

	rootLogger: Logger

	/**
	 * Get a subsystem logger by name.
	 *
	 * @returns Logger for the [name, subsystem] category
	 */
	getSubsystemLogger: (subsystem: string) => Logger

	logDir: string

	logFile: string

	/** Pre-created loggers keyed by subsystem name */
	subsystemLoggers: Record<string, Logger>
}

/**
 * Create the configured logger for an application.
 *
 * @example
 * ```typescript
 * const { initLogger, getSubsystemLogger } = createAppLogger({
 *   name: "loopback-pkce",
 *   subsystems: ["listener", "token"],
 * });
 *
 * await initLogger({ console: flags.verbose === true });
 * getSubsystemLogger("token").info("Token refreshed");
 * ```
 */
export function createAppLogger(options: AppLoggerOptions): AppLogger {
	const {
		name,
		subsystems = [],
		logDir = DEFAULT_LOG_DIR,
		logFileName = name,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false

	async function initLogger(initOptions: InitLoggerOptions = {}): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true, mode: 0o700 })
		}

		const fileSinkName = `file_${name}`
		const sinks: Record<string, Sink> = {
			[fileSinkName]: getRotatingFileSink(logFile, {
				formatter: jsonLinesFormatter,
				maxSize,
				maxFiles,
			}),
		}
		const appSinks = [fileSinkName]

		if (initOptions.console) {
			sinks.console = withFilter(getConsoleSink(), initOptions.consoleLevel ?? 'info')
			appSinks.push('console')
		}

		try {
			await configure({
				sinks,
				loggers: [
					{ category: [name], sinks: appSinks, lowestLevel },
					{ category: ['logtape', 'meta'], sinks: [fileSinkName], lowestLevel: 'error' },
				],
			})
		} catch (error: unknown) {
			// Tests (or an embedding application) may have configured LogTape already
			if (error instanceof Error && error.message.includes('Already configured')) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([name]).info('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
			console: initOptions.console === true,
		})

		isInitialized = true
	}

	const rootLogger = getLogger([name])

	function getSubsystemLogger(subsystem: string): Logger {
		return getLogger([name, subsystem])
	}

	const subsystemLoggers: Record<string, Logger> = {}
	for (const subsystem of subsystems) {
		subsystemLoggers[subsystem] = getSubsystemLogger(subsystem)
	}

	return {
		initLogger,
		createCorrelationId,
		rootLogger,
		getSubsystemLogger,
		logDir,
		logFile,
		subsystemLoggers,
	}
}
