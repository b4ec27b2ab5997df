/**
 * Logger
 * Leveled, context-tagged logging to the console and (optionally) a rotating file
 */

import { getLogWriter, type LogWriter } from "./LogWriter";
import { getLoggingConfig, LogLevel } from "../config/logging";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
}

/**
 * Where formatted lines go; swapped out in tests
 */
export interface LogSink {
	console(level: LogLevel, line: string): void;
	file?(line: string): void;
}

const loggingConfig = getLoggingConfig();

const DEFAULT_CONFIG: LoggerConfig = {
	level: loggingConfig.level,
	enableTimestamps: true,
	enableColors: process.stdout.isTTY === true,
	enableFileLogging: loggingConfig.fileLogging,
	enableConsoleLogging: loggingConfig.consoleLogging,
};

/**
 * ANSI color codes for terminal output
 */
const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

/**
 * JSON.stringify that survives D-Bus int64 values
 */
export function stringifyLogData(data: unknown, indent?: number): string {
	if (typeof data !== "object" || data === null) {
		return typeof data === "bigint" ? `${data}n` : String(data);
	}
	return JSON.stringify(
		data,
		(_key, value: unknown) =>
			typeof value === "bigint" ? `${value}n` : value,
		indent,
	);
}

function defaultSink(writer: LogWriter | null): LogSink {
	return {
		console(level, line) {
			if (level === LogLevel.ERROR) console.error(line);
			else if (level === LogLevel.WARN) console.warn(line);
			else console.log(line);
		},
		file: writer ? (line) => writer.write(line) : undefined,
	};
}

function resolveSink(config: LoggerConfig, sink?: LogSink): LogSink {
	return (
		sink ??
		defaultSink(
			config.enableFileLogging
				? getLogWriter({
						logDir: loggingConfig.logDir,
						maxFileSize: loggingConfig.maxFileSize,
						maxFiles: loggingConfig.maxFiles,
					})
				: null,
		)
	);
}

/**
 * Configuration and sink shared by a logger and all of its children
 */
interface LoggerState {
	config: LoggerConfig;
	sink: LogSink;
}

/**
 * Logger class with support for different log levels and contexts
 */
export class Logger {
	private state: LoggerState;
	private context: string;

	constructor(
		context: string = "mpris",
		config: Partial<LoggerConfig> = {},
		sink?: LogSink,
	) {
		this.context = context;
		const resolved = { ...DEFAULT_CONFIG, ...config };
		this.state = { config: resolved, sink: resolveSink(resolved, sink) };
	}

	private get config(): LoggerConfig {
		return this.state.config;
	}

	private get sink(): LogSink {
		return this.state.sink;
	}

	/**
	 * Create a child logger with a different context.
	 * Children follow later configure() and setLevel() calls on any logger of the family.
	 */
	child(context: string): Logger {
		const child = new Logger(
			`${this.context}:${context}`,
			this.state.config,
			this.state.sink,
		);
		child.state = this.state;
		return child;
	}

	/**
	 * Replace the configuration; without a sink, output goes to the console
	 * and, when enabled, the log file
	 */
	configure(config: Partial<LoggerConfig>, sink?: LogSink): void {
		const resolved = { ...DEFAULT_CONFIG, ...config };
		this.state.config = resolved;
		this.state.sink = resolveSink(resolved, sink);
	}

	/**
	 * Set the minimum log level
	 */
	setLevel(level: LogLevel): void {
		this.state.config.level = level;
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	/**
	 * Console line: short timestamp, padded level, context, message, data
	 */
	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const paint = (code: string, text: string) =>
			this.config.enableColors ? `${code}${text}${colors.reset}` : text;
		const parts: string[] = [];

		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(paint(colors.gray, `[${timestamp}]`));
		}
		parts.push(paint(color, level.padEnd(5)));
		parts.push(paint(colors.cyan, `[${this.context}]`));
		parts.push(message);

		if (data !== undefined) {
			parts.push(`\n${paint(colors.dim, stringifyLogData(data, 2))}`);
		}

		return parts.join(" ");
	}

	/**
	 * File line: full ISO timestamp, no colors, data on one line
	 */
	private formatPlain(level: string, message: string, data?: unknown): string {
		const parts = [
			new Date().toISOString(),
			`[${level}]`,
			`[${this.context}]`,
			message,
		];
		if (data !== undefined) {
			parts.push(stringifyLogData(data));
		}
		return parts.join(" ");
	}

	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		if (this.config.level > level) return;

		if (this.config.enableConsoleLogging) {
			this.sink.console(level, this.format(levelStr, message, color, data));
		}

		if (this.config.enableFileLogging && this.sink.file) {
			this.sink.file(this.formatPlain(levelStr, message, data));
		}
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	/**
	 * Error log; Error instances are flattened so they serialize
	 */
	error(message: string, error?: unknown): void {
		let errorData: unknown = error;

		if (error instanceof Error) {
			errorData = {
				name: error.name,
				message: error.message,
				stack: error.stack,
			};
		}

		this.log(LogLevel.ERROR, "ERROR", colors.red, message, errorData);
	}
}

let globalLogger: Logger | null = null;

/**
 * Get the library logger, or a child of it for `context`
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("mpris");
	}
	return context ? globalLogger.child(context) : globalLogger;
}

/**
 * Reconfigure the library logger, including the component loggers
 * handed out by getLogger() earlier
 */
export function configureLogger(
	config: Partial<LoggerConfig>,
	sink?: LogSink,
): Logger {
	const logger = getLogger();
	logger.configure(config, sink);
	return logger;
}
