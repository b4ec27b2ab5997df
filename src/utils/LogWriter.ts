/**
 * LogWriter - buffered, size-rotated log file output
 */

import { existsSync, mkdirSync, renameSync, statSync, unlinkSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

export interface LogWriterConfig {
	/** Directory where log files are stored */
	logDir: string;
	/** Log file base name */
	filename: string;
	/** Maximum size of a single log file in bytes */
	maxFileSize: number;
	/** Maximum number of rotated log files to keep */
	maxFiles: number;
	/** Interval in milliseconds to flush buffered logs */
	flushInterval: number;
	/** Lines buffered before an early flush */
	maxBufferedLines: number;
	enabled: boolean;
}

const DEFAULT_CONFIG: LogWriterConfig = {
	logDir: join(homedir(), ".mpris-control", "logs"),
	filename: "mpris-control.log",
	maxFileSize: 5 * 1024 * 1024, // 5MB
	maxFiles: 5,
	flushInterval: 1000,
	maxBufferedLines: 100,
	enabled: true,
};

export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize: number = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private flushing: Promise<void> | null = null;
	private initialized: boolean = false;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...DEFAULT_CONFIG, ...config };
		this.initialize();
	}

	/**
	 * Create the log directory and start the flush timer
	 */
	private initialize(): void {
		if (!this.config.enabled) {
			return;
		}

		try {
			if (!existsSync(this.config.logDir)) {
				mkdirSync(this.config.logDir, { recursive: true });
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err) => {
					console.error("Log flush error:", err);
				});
			}, this.config.flushInterval);

			// Never keep the host process alive for logging
			this.flushTimer.unref();

			this.initialized = true;
		} catch (error) {
			console.error("Failed to initialize LogWriter:", error);
			this.config.enabled = false;
		}
	}

	getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Queue a line for the next flush
	 */
	write(message: string): void {
		if (!this.config.enabled || !this.initialized) {
			return;
		}

		this.buffer.push(message.endsWith("\n") ? message : `${message}\n`);

		if (this.buffer.length > this.config.maxBufferedLines) {
			this.flush().catch((err) => {
				console.error("Log flush error:", err);
			});
		}
	}

	/**
	 * Append buffered lines to disk, rotating when the file is full
	 */
	async flush(): Promise<void> {
		// Another caller may have started a flush while this one waited
		while (this.flushing) {
			await this.flushing;
		}
		if (!this.config.enabled || this.buffer.length === 0) {
			return;
		}

		const content = this.buffer.join("");
		this.buffer = [];

		this.flushing = (async () => {
			try {
				await appendFile(this.getLogFilePath(), content, "utf-8");
				this.currentSize += Buffer.byteLength(content, "utf-8");

				if (this.currentSize >= this.config.maxFileSize) {
					this.rotate();
				}
			} finally {
				this.flushing = null;
			}
		})();

		await this.flushing;
	}

	/**
	 * name.log -> name.log.1 -> ... -> name.log.<maxFiles> (dropped)
	 */
	private rotate(): void {
		const oldest = this.getRotatedLogFilePath(this.config.maxFiles);
		if (existsSync(oldest)) {
			unlinkSync(oldest);
		}

		for (let i = this.config.maxFiles - 1; i > 0; i--) {
			const current = this.getRotatedLogFilePath(i);
			if (existsSync(current)) {
				renameSync(current, this.getRotatedLogFilePath(i + 1));
			}
		}

		const logFile = this.getLogFilePath();
		if (existsSync(logFile)) {
			renameSync(logFile, this.getRotatedLogFilePath(1));
		}

		this.currentSize = 0;
	}

	/**
	 * Stop the timer and flush what is left
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}

		await this.flush();
	}

	getBufferSize(): number {
		return this.buffer.length;
	}

	getCurrentFileSize(): number {
		return this.currentSize;
	}
}

let instance: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!instance) {
		instance = new LogWriter(config);
	}
	return instance;
}

/**
 * Flush and drop the shared writer
 */
export async function resetLogWriter(): Promise<void> {
	const current = instance;
	instance = null;
	if (current) {
		await current.shutdown();
	}
}
