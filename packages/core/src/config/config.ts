import { LOG_LEVELS, type LogLevel } from "../logger.ts";

export type DatabaseDriver = "level" | "memory";

/**
 * Application configuration interface
 */
export interface AppConfig {
	server: {
		port: number;
		host: string;
		bodyLimit: string;
	};
	database: {
		driver: DatabaseDriver;
		path: string;
	};
	logging: {
		level: LogLevel;
	};
	cors: {
		enabled: boolean;
		origins: string[];
		credentials: boolean;
	};
}

const DATABASE_DRIVERS: readonly DatabaseDriver[] = ["level", "memory"];

const isLogLevel = (value: string): value is LogLevel =>
	LOG_LEVELS.some((level) => level === value);

const isDatabaseDriver = (value: string): value is DatabaseDriver =>
	DATABASE_DRIVERS.some((driver) => driver === value);

const parsePort = (raw: string | undefined, fallback: number): number => {
	if (raw === undefined || raw.trim().length === 0) {
		return fallback;
	}
	const parsed = Number(raw);
	return Number.isInteger(parsed) ? parsed : Number.NaN;
};

const splitList = (raw: string): string[] =>
	raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);

/**
 * Build configuration from an environment map. Unknown driver or log level
 * names throw instead of falling back to a default.
 */
export const loadConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
	const logLevel = env.LOG_LEVEL ?? "info";
	const driver = env.DB_DRIVER ?? "level";
	return {
		server: {
			port: parsePort(env.PORT, 8080),
			host: env.HOST || "0.0.0.0",
			bodyLimit: env.BODY_LIMIT || "1mb",
		},
		database: {
			driver: isDatabaseDriver(driver) ? driver : invalidDriver(driver),
			path: env.DB_PATH ?? "./db/miniapp",
		},
		logging: {
			level: isLogLevel(logLevel) ? logLevel : invalidLogLevel(logLevel),
		},
		cors: {
			enabled: env.CORS_ENABLED !== "false",
			origins: env.CORS_ORIGINS ? splitList(env.CORS_ORIGINS) : ["*"],
			credentials: env.CORS_CREDENTIALS === "true",
		},
	};
};

class InvalidConfigValue extends Error {
	constructor(key: string, value: string) {
		super(`Invalid ${key}: ${value}`);
		this.name = "InvalidConfigValue";
	}
}

const invalidDriver = (value: string): never => {
	throw new InvalidConfigValue("database driver", value);
};

const invalidLogLevel = (value: string): never => {
	throw new InvalidConfigValue("log level", value);
};

/**
 * Configuration validator
 */
export const ConfigValidator = {
	validate(config: AppConfig): { isValid: boolean; errors: string[] } {
		const errors: string[] = [];

		// Validate server configuration
		if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
			errors.push("Server port must be between 0 and 65535");
		}
		if (config.server.host.trim().length === 0) {
			errors.push("Server host is required");
		}

		// Validate database configuration
		if (!isDatabaseDriver(config.database.driver)) {
			errors.push(`Invalid database driver: ${config.database.driver}`);
		}
		if (config.database.driver === "level" && config.database.path.trim().length === 0) {
			errors.push("Database path is required");
		}

		// Validate logging configuration
		if (!isLogLevel(config.logging.level)) {
			errors.push(`Invalid log level: ${config.logging.level}`);
		}

		if (config.cors.enabled && config.cors.origins.length === 0) {
			errors.push("At least one CORS origin must be configured when CORS is enabled");
		}

		return {
			isValid: errors.length === 0,
			errors,
		};
	},
};

/**
 * Configuration manager
 */
export class ConfigManager {
	private static instance: ConfigManager | undefined;
	private config: AppConfig;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.config = this.loadConfig(env);
	}

	static getInstance(): ConfigManager {
		if (!ConfigManager.instance) {
			ConfigManager.instance = new ConfigManager();
		}
		return ConfigManager.instance;
	}

	static resetInstance(): void {
		ConfigManager.instance = undefined;
	}

	private loadConfig(env: NodeJS.ProcessEnv): AppConfig {
		let config: AppConfig;
		try {
			config = loadConfigFromEnv(env);
		} catch (error) {
			if (error instanceof InvalidConfigValue) {
				throw new Error(`Invalid configuration: ${error.message}`);
			}
			throw error;
		}

		// Validate final configuration
		const validation = ConfigValidator.validate(config);
		if (!validation.isValid) {
			throw new Error(`Invalid configuration: ${validation.errors.join(", ")}`);
		}

		return config;
	}

	getConfig(): AppConfig {
		return { ...this.config };
	}

	getServerConfig() {
		return this.config.server;
	}

	getDatabaseConfig() {
		return this.config.database;
	}

	getLoggingConfig() {
		return this.config.logging;
	}

	getCorsConfig() {
		return this.config.cors;
	}
}
