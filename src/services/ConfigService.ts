import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_CALL_TIMEOUT_MS } from "../config/constants";
import { getLogger } from "../utils/Logger";

const logger = getLogger("ConfigService");

/**
 * Client settings
 */
export interface ClientConfig {
	/** Per-call reply timeout in milliseconds; 0 disables it */
	callTimeoutMs: number;
}

const DEFAULT_CLIENT_CONFIG: ClientConfig = {
	callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
};

const TimeoutSchema = z.coerce.number().int().min(0);

const ConfigFileSchema = z
	.object({
		callTimeoutMs: TimeoutSchema.optional(),
	})
	.strict();

export interface ConfigServiceOptions {
	/** Overrides the XDG-derived directory */
	configDir?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * Resolves client settings: defaults, then config.json, then environment.
 * Read-only: the library never writes configuration.
 */
export class ConfigService {
	private configDir: string;
	private configPath: string;
	private env: NodeJS.ProcessEnv;

	constructor(options: ConfigServiceOptions = {}) {
		this.env = options.env ?? process.env;
		// Use XDG_CONFIG_HOME if available, otherwise ~/.config
		const configHome =
			this.env.XDG_CONFIG_HOME || join(homedir(), ".config");
		this.configDir = options.configDir ?? join(configHome, "mpris-control");
		this.configPath = join(this.configDir, "config.json");
	}

	getConfigDir(): string {
		return this.configDir;
	}

	getConfigPath(): string {
		return this.configPath;
	}

	/**
	 * Settings from config.json; empty when absent or invalid
	 */
	loadConfigFile(): Partial<ClientConfig> {
		if (!existsSync(this.configPath)) {
			return {};
		}

		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(this.configPath, "utf-8"));
		} catch (error) {
			logger.warn(`Ignoring unreadable config file ${this.configPath}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			return {};
		}

		const parsed = ConfigFileSchema.safeParse(raw);
		if (!parsed.success) {
			logger.warn(
				`Ignoring invalid config file ${this.configPath}`,
				parsed.error.issues.map((issue) => issue.message),
			);
			return {};
		}

		return parsed.data;
	}

	/**
	 * Settings from MPRIS_CONTROL_* environment variables
	 */
	loadEnvironment(): Partial<ClientConfig> {
		const value = this.env.MPRIS_CONTROL_CALL_TIMEOUT_MS;
		if (value === undefined || value === "") {
			return {};
		}

		const parsed = TimeoutSchema.safeParse(value);
		if (!parsed.success) {
			logger.warn(`Ignoring MPRIS_CONTROL_CALL_TIMEOUT_MS="${value}"`);
			return {};
		}
		return { callTimeoutMs: parsed.data };
	}

	/**
	 * Effective configuration
	 */
	load(): ClientConfig {
		return {
			...DEFAULT_CLIENT_CONFIG,
			...this.loadConfigFile(),
			...this.loadEnvironment(),
		};
	}
}

let configServiceInstance: ConfigService | null = null;

export function getConfigService(): ConfigService {
	if (!configServiceInstance) {
		configServiceInstance = new ConfigService();
	}
	return configServiceInstance;
}
