/**
 * Logger - File-based logging with daily rotation.
 *
 * Provides multiple logger implementations:
 * - createLogger: Daily log files in the data directory's logs folder
 * - createConsoleLogger: Same format on stderr (CLI)
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {getLogPath, getLogsDir} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

function isEnabled(level: LogLevel, minLevel: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

function createWriterLogger(
	write: (entry: string) => void,
	minLevel: LogLevel,
): Logger {
	function emit(
		level: LogLevel,
		component: string,
		message: string,
		extra?: object | Error,
	) {
		if (!isEnabled(level, minLevel)) return;
		write(formatEntry(level, component, message, extra));
	}

	return {
		debug(component: string, message: string, data?: object) {
			emit('debug', component, message, data);
		},

		info(component: string, message: string, data?: object) {
			emit('info', component, message, data);
		},

		warn(component: string, message: string, data?: object) {
			emit('warn', component, message, data);
		},

		error(component: string, message: string, error?: Error) {
			emit('error', component, message, error);
		},
	};
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a logger that writes to daily log files.
 *
 * @example
 * const logger = createLogger('/var/lib/termbase', 'info');
 * logger.error('Synchronizer', 'Vector upsert failed', error);
 * // Writes to: /var/lib/termbase/logs/2024-01-11.log
 */
export function createLogger(
	dataDir: string,
	minLevel: LogLevel = 'info',
): Logger {
	let reported = false;
	return createWriterLogger(entry => {
		try {
			// Recreated on each write in case the data dir was removed
			fs.mkdirSync(getLogsDir(dataDir), {recursive: true});
			fs.appendFileSync(getLogPath(dataDir), entry + '\n');
		} catch (error) {
			if (reported) return;
			reported = true;
			process.stderr.write(
				`termbase: cannot write log file under ${dataDir}: ${
					error instanceof Error ? error.message : String(error)
				}\n`,
			);
		}
	}, minLevel);
}

/**
 * Create a logger that writes to stderr.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
	return createWriterLogger(entry => {
		process.stderr.write(entry + '\n');
	}, minLevel);
}

/**
 * Fan out every entry to several loggers.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
	return {
		debug(component, message, data) {
			for (const l of loggers) l.debug(component, message, data);
		},
		info(component, message, data) {
			for (const l of loggers) l.info(component, message, data);
		},
		warn(component, message, data) {
			for (const l of loggers) l.warn(component, message, data);
		},
		error(component, message, error) {
			for (const l of loggers) l.error(component, message, error);
		},
	};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

/**
 * Coerce an unknown thrown value into an Error for logging.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
