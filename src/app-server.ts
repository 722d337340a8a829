import type http from "node:http";
import type { AppConfig, Logger } from "@miniapp/core";
import { buildHttpApiApp } from "@miniapp/http-api";
import { createPagesModule, type PagesModule } from "@miniapp/pages";
import { InMemoryKeyValueAdapter, type KeyValueAdapter } from "@miniapp/persistence-adapter";
import { LevelKeyValueAdapter } from "@miniapp/persistence-level";

export const createStorageAdapter = (
	database: AppConfig["database"],
): KeyValueAdapter<string, unknown> =>
	database.driver === "memory"
		? new InMemoryKeyValueAdapter<unknown>()
		: new LevelKeyValueAdapter<unknown>(database.path);

export type RunningServer = {
	server: http.Server;
	pages: PagesModule;
	shutdown(): Promise<void>;
};

// Start the REST API with the given configuration
export async function startServer(config: AppConfig, logger: Logger): Promise<RunningServer> {
	const serverLogger = logger.child({ component: "server" });
	const pages = createPagesModule(createStorageAdapter(config.database), { logger });
	await pages.open();
	serverLogger.info(
		config.database.driver === "level"
			? `Storage ready (level at ${config.database.path})`
			: "Storage ready (memory)",
	);

	const app = buildHttpApiApp({
		pageDirectory: pages.pageDirectory,
		widgetSequencer: pages.widgetSequencer,
		logger,
		cors: config.cors,
		bodyLimit: config.server.bodyLimit,
	});

	const server = await new Promise<http.Server>((resolve, reject) => {
		const listening = app.listen(config.server.port, config.server.host);
		listening.once("listening", () => resolve(listening));
		listening.once("error", (error) => reject(error));
	});
	serverLogger.info(`Mini App Config API listening on ${config.server.host}:${config.server.port}`);

	let closing: Promise<void> | null = null;
	const shutdown = (): Promise<void> => {
		if (!closing) {
			closing = new Promise<void>((resolve, reject) => {
				server.close((error) => (error ? reject(error) : resolve()));
			}).then(() => pages.close());
		}
		return closing;
	};

	return { server, pages, shutdown };
}
