/**
 * LogTape-based logging.
 *
 * - JSONL file output, rotated at 1 MiB, 5 files kept
 * - Hierarchical categories for subsystem filtering
 * - Correlation IDs tying together the records of one token run
 *
 * @example
 * ```typescript
 * import { createAppLogger } from "loopback-pkce/logging";
 *
 * const { initLogger, subsystemLoggers } = createAppLogger({
 *   name: "loopback-pkce",
 *   subsystems: ["token"],
 * });
 *
 * await initLogger();
 * subsystemLoggers.token?.debug("Token endpoint responded", { status: 200 });
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	type LogLevel,
} from './config.ts'
export { createCorrelationId } from './correlation.ts'
export {
	type AppLogger,
	type AppLoggerOptions,
	createAppLogger,
	type InitLoggerOptions,
} from './factory.ts'
