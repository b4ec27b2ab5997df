/**
 * Logging Configuration
 * Centralized configuration for the logging system
 */

import { homedir } from "node:os";
import { join } from "node:path";

// LogLevel enum defined locally to avoid circular dependency
export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	NONE = 4,
}

export interface LoggingConfig {
	/** Minimum log level to display/write */
	level: LogLevel;
	/** Whether to write logs to file */
	fileLogging: boolean;
	/** Whether to also output to console */
	consoleLogging: boolean;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Directory where log files are stored */
	logDir: string;
}

/**
 * Parse log level from environment variable or string
 */
export function parseLogLevel(
	value: string | undefined,
	fallback: LogLevel = LogLevel.WARN,
): LogLevel {
	if (!value) return fallback;

	switch (value.toUpperCase()) {
		case "DEBUG":
			return LogLevel.DEBUG;
		case "INFO":
			return LogLevel.INFO;
		case "WARN":
			return LogLevel.WARN;
		case "ERROR":
			return LogLevel.ERROR;
		case "NONE":
			return LogLevel.NONE;
		default:
			return fallback;
	}
}

/**
 * Build logging configuration from an environment map
 */
export function resolveLoggingConfig(
	env: NodeJS.ProcessEnv = process.env,
): LoggingConfig {
	return {
		level: parseLogLevel(env.MPRIS_CONTROL_LOG_LEVEL),
		fileLogging: env.MPRIS_CONTROL_LOG_FILE === "true",
		consoleLogging: env.MPRIS_CONTROL_LOG_CONSOLE !== "false",
		maxFileSize: 5 * 1024 * 1024, // 5MB
		maxFiles: 5,
		logDir:
			env.MPRIS_CONTROL_LOG_DIR || join(homedir(), ".mpris-control", "logs"),
	};
}

/**
 * Get logging configuration for the current process
 */
export function getLoggingConfig(): LoggingConfig {
	return resolveLoggingConfig(process.env);
}
