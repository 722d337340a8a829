import "dotenv/config";
import { ConfigManager, Logger } from "@miniapp/core";
import { startServer } from "./app-server.ts";

async function main(): Promise<void> {
	const config = ConfigManager.getInstance().getConfig();
	const logger = new Logger(config.logging.level, "miniapp");
	const { shutdown } = await startServer(config, logger);

	const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];
	for (const signal of signals) {
		process.once(signal, () => {
			logger.info(`Received ${signal}, shutting down`);
			shutdown().then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error("Shutdown failed", error);
					process.exit(1);
				},
			);
		});
	}
}

main().catch((error: unknown) => {
	console.error("[SERVER] Failed to start:", error);
	process.exit(1);
});
