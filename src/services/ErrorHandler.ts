import dbus from "dbus-next";
import { ZodError } from "zod";
import { getLogger } from "../utils/Logger";
import type { MatchToken } from "../types/mpris";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Expected outcome the caller will handle (e.g. an absent player) */
	INFO = "info",
	WARNING = "warning",
	ERROR = "error",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** Name does not resolve to a conformant player */
	INVALID_PLAYER = "invalid_player",
	/** Malformed argument, rejected locally or by the player */
	INVALID_ARGUMENT = "invalid_argument",
	/** Call, property access or match (de)registration failed on the bus */
	TRANSPORT = "transport",
	/** Value on the wire is not of the requested type */
	TYPE_MISMATCH = "type_mismatch",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity?: ErrorSeverity;
	operation: string; // What was being attempted
	metadata?: Record<string, unknown>;
}

/**
 * Every failure surfaced by this library
 */
export class MprisError extends Error {
	readonly category: ErrorCategory;
	readonly operation: string;
	/** D-Bus error name when the bus answered with an error reply */
	readonly dbusErrorName?: string;

	constructor(
		category: ErrorCategory,
		operation: string,
		message: string,
		options: { cause?: unknown; dbusErrorName?: string } = {},
	) {
		super(message, { cause: options.cause });
		this.name = "MprisError";
		this.category = category;
		this.operation = operation;
		this.dbusErrorName = options.dbusErrorName;
	}
}

export interface ClearFailure {
	token: MatchToken;
	error: MprisError;
}

/**
 * Raised by EventManager.clearCallbacks after every token was attempted
 */
export class ClearCallbacksError extends MprisError {
	readonly failures: readonly ClearFailure[];

	constructor(failures: ClearFailure[]) {
		super(
			ErrorCategory.TRANSPORT,
			"clearCallbacks",
			`Failed to remove ${failures.length} match registration(s): ${failures
				.map((f) => `#${f.token}`)
				.join(", ")}`,
			{ cause: failures[0]?.error },
		);
		this.name = "ClearCallbacksError";
		this.failures = failures;
	}
}

/**
 * Error listener registered by the embedding application
 */
type ErrorListener = (error: MprisError) => Promise<void> | void;

/**
 * D-Bus error names that mean the request itself was wrong
 */
const ARGUMENT_ERROR_NAMES = new Set([
	"org.freedesktop.DBus.Error.InvalidArgs",
	"org.freedesktop.DBus.Error.UnknownProperty",
	"org.freedesktop.DBus.Error.UnknownMethod",
	"org.freedesktop.DBus.Error.PropertyReadOnly",
]);

/**
 * Central error handling
 * Turns anything thrown into an MprisError, logs it and notifies listeners
 */
export class ErrorHandler {
	private listeners: Map<ErrorCategory, ErrorListener[]> = new Map();

	/**
	 * Observe every error of a category
	 */
	onError(category: ErrorCategory, listener: ErrorListener): () => void {
		const existing = this.listeners.get(category) ?? [];
		this.listeners.set(category, [...existing, listener]);
		return () => {
			const current = this.listeners.get(category) ?? [];
			this.listeners.set(
				category,
				current.filter((l) => l !== listener),
			);
		};
	}

	/**
	 * Normalize, log and publish an error; the result is for the caller to throw
	 */
	async handle(error: unknown, context: ErrorContext): Promise<MprisError> {
		const err = this.normalizeError(error, context);

		this.logError(err, context);
		await this.notify(err);

		return err;
	}

	/**
	 * Run a remote operation, converting its failure into an MprisError
	 */
	async guard<T>(
		operation: string,
		task: () => Promise<T>,
		metadata?: Record<string, unknown>,
	): Promise<T> {
		try {
			return await task();
		} catch (error) {
			throw await this.handle(error, {
				category: ErrorCategory.TRANSPORT,
				operation,
				metadata,
			});
		}
	}

	/**
	 * Fill in category/message for errors that are not ours yet.
	 * `context.category` applies only to errors that carry no better one.
	 */
	normalizeError(error: unknown, context: ErrorContext): MprisError {
		if (error instanceof MprisError) {
			return error;
		}

		if (error instanceof dbus.DBusError) {
			const category = ARGUMENT_ERROR_NAMES.has(error.type)
				? ErrorCategory.INVALID_ARGUMENT
				: context.category;
			return new MprisError(
				category,
				context.operation,
				`${context.operation} failed: ${error.type}: ${error.text}`,
				{ cause: error, dbusErrorName: error.type },
			);
		}

		if (error instanceof ZodError) {
			const issues = error.issues
				.map((issue) =>
					issue.path.length > 0
						? `${issue.path.join(".")}: ${issue.message}`
						: issue.message,
				)
				.join("; ");
			return new MprisError(
				ErrorCategory.TYPE_MISMATCH,
				context.operation,
				`${context.operation} failed: unexpected value (${issues})`,
				{ cause: error },
			);
		}

		const message =
			error instanceof Error
				? error.message
				: typeof error === "string"
					? error
					: String(error);
		return new MprisError(
			context.category,
			context.operation,
			`${context.operation} failed: ${message}`,
			{ cause: error },
		);
	}

	private logError(error: MprisError, context: ErrorContext): void {
		const logMessage = `[${error.category}] ${error.operation}: ${error.message}`;

		switch (context.severity ?? ErrorSeverity.ERROR) {
			case ErrorSeverity.INFO:
				logger.info(logMessage, context.metadata);
				break;
			case ErrorSeverity.WARNING:
				logger.warn(logMessage, context.metadata);
				break;
			case ErrorSeverity.ERROR:
				logger.error(logMessage, context.metadata);
				break;
		}
	}

	private async notify(error: MprisError): Promise<void> {
		const listeners = this.listeners.get(error.category);
		if (!listeners || listeners.length === 0) {
			return;
		}

		for (const listener of listeners) {
			try {
				await listener(error);
			} catch (listenerError) {
				logger.error("Error listener failed:", listenerError);
			}
		}
	}

	/**
	 * Drop all listeners
	 */
	dispose(): void {
		this.listeners.clear();
	}
}

let instance: ErrorHandler | null = null;

/**
 * Shared handler used by players and event managers
 */
export function getErrorHandler(): ErrorHandler {
	if (!instance) {
		instance = new ErrorHandler();
	}
	return instance;
}

/**
 * Create a new ErrorHandler instance (for testing)
 */
export function createErrorHandler(): ErrorHandler {
	return new ErrorHandler();
}
