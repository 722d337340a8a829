// Structured logger shared by every package
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	service?: string;
	component?: string | undefined;
	pageId?: string;
	widgetId?: string;
	requestId?: string;
	error?: {
		name: string;
		message: string;
		stack?: string;
		code?: string;
	};
	metadata?: Record<string, unknown>;
	duration?: number;
	correlationId?: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const CONTEXT_KEYS = new Set([
	"pageId",
	"widgetId",
	"requestId",
	"correlationId",
	"duration",
	"error",
]);

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
	const value = record[key];
	return typeof value === "string" ? value : undefined;
};

export class Logger {
	private level: LogLevel = "info";
	private service: string;
	private component?: string;

	constructor(level: LogLevel = "info", service: string = "miniapp", component?: string) {
		this.level = level;
		this.service = service;
		if (component !== undefined) {
			this.component = component;
		}
	}

	getLevel(): LogLevel {
		return this.level;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
	}

	private createLogEntry(
		level: LogLevel,
		message: string,
		metadata?: Record<string, unknown>,
	): LogEntry {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			service: this.service,
		};

		if (this.component !== undefined) {
			entry.component = this.component;
		}
		if (!metadata) {
			return entry;
		}

		const pageId = readString(metadata, "pageId");
		const widgetId = readString(metadata, "widgetId");
		const requestId = readString(metadata, "requestId");
		const correlationId = readString(metadata, "correlationId");
		if (pageId !== undefined) entry.pageId = pageId;
		if (widgetId !== undefined) entry.widgetId = widgetId;
		if (requestId !== undefined) entry.requestId = requestId;
		if (correlationId !== undefined) entry.correlationId = correlationId;
		if (typeof metadata.duration === "number") entry.duration = metadata.duration;
		if (isLogError(metadata.error)) entry.error = metadata.error;

		const rest = Object.entries(metadata).filter(([key]) => !CONTEXT_KEYS.has(key));
		if (rest.length > 0) {
			entry.metadata = Object.fromEntries(rest);
		}

		return entry;
	}

	formatLogEntry(entry: LogEntry): string {
		const baseFields = [
			entry.timestamp,
			entry.level.toUpperCase(),
			entry.service,
			entry.component || "unknown",
		]
			.filter(Boolean)
			.join(" | ");

		let message = `[${baseFields}] ${entry.message}`;

		// Add contextual fields
		const contextFields: string[] = [];
		if (entry.pageId) contextFields.push(`page=${entry.pageId}`);
		if (entry.widgetId) contextFields.push(`widget=${entry.widgetId}`);
		if (entry.requestId) contextFields.push(`req=${entry.requestId}`);
		if (entry.correlationId) contextFields.push(`corr=${entry.correlationId}`);
		if (entry.duration !== undefined) contextFields.push(`duration=${entry.duration}ms`);

		if (contextFields.length > 0) {
			message += ` [${contextFields.join(", ")}]`;
		}

		// Add structured metadata
		if (entry.error || entry.metadata) {
			const structured = {
				...(entry.error && { error: entry.error }),
				...(entry.metadata && { meta: entry.metadata }),
			};
			message += ` ${JSON.stringify(structured)}`;
		}

		return message;
	}

	private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
		if (!this.shouldLog(level)) return;

		const entry = this.createLogEntry(level, message, metadata);
		const formattedMessage = this.formatLogEntry(entry);

		switch (level) {
			case "debug":
				console.debug(formattedMessage);
				break;
			case "info":
				console.info(formattedMessage);
				break;
			case "warn":
				console.warn(formattedMessage);
				break;
			case "error":
				console.error(formattedMessage);
				break;
		}
	}

	debug(message: string, metadata?: Record<string, unknown>): void {
		this.log("debug", message, metadata);
	}

	info(message: string, metadata?: Record<string, unknown>): void {
		this.log("info", message, metadata);
	}

	warn(message: string, metadata?: Record<string, unknown>): void {
		this.log("warn", message, metadata);
	}

	error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
		const errorData = describeError(error);
		this.log("error", message, {
			...metadata,
			...(errorData && { error: errorData }),
		});
	}

	// Performance logging
	startTimer(operation: string, metadata?: Record<string, unknown>): () => void {
		const startTime = Date.now();
		const correlationId = this.generateCorrelationId();

		this.debug(`Starting operation: ${operation}`, {
			...metadata,
			correlationId,
		});

		return () => {
			const duration = Date.now() - startTime;
			this.debug(`Completed operation: ${operation}`, {
				...metadata,
				correlationId,
				duration,
			});
		};
	}

	// Create child logger with additional context
	child(context: { component?: string; service?: string }): Logger {
		return new Logger(
			this.level,
			context.service || this.service,
			context.component || this.component,
		);
	}

	private generateCorrelationId(): string {
		return (
			Math.random().toString(36).substring(2, 15) + Math.random().toString(36).substring(2, 15)
		);
	}

	// Static factory methods
	static create(service: string, component?: string): Logger {
		return new Logger("info", service, component);
	}

	static createDebug(service: string, component?: string): Logger {
		return new Logger("debug", service, component);
	}
}

const isLogError = (value: unknown): value is NonNullable<LogEntry["error"]> =>
	typeof value === "object"
	&& value !== null
	&& "name" in value
	&& typeof value.name === "string"
	&& "message" in value
	&& typeof value.message === "string";

const describeError = (error: unknown): LogEntry["error"] | undefined => {
	if (error instanceof Error) {
		const code = "code" in error ? error.code : undefined;
		return {
			name: error.name,
			message: error.message,
			...(error.stack !== undefined && { stack: error.stack }),
			...(code !== undefined && { code: String(code) }),
		};
	}
	if (error === undefined || error === null) {
		return undefined;
	}
	return { name: "NonError", message: String(error) };
};

// Default logger instance
export const logger = Logger.create("miniapp");
