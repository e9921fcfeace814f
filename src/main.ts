import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { settings } from "./config/settings";
import { createServices } from "./container";
import { closeRegistry, initializeRegistry } from "./db/registry";
import { logger } from "./utils/logger";

const services = createServices();
const app = createApp(services);

async function initialize() {
	logger.info("Initializing SOC QA review service");
	await initializeRegistry();
	logger.info("Run ledger initialized");
}

async function startServer() {
	await initialize();

	const port = settings.server.port;
	const host = settings.server.host;

	logger.info("Starting server", { host, port });

	const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
		logger.info("Server running", { address: info.address, port: info.port });
	});

	const shutdown = (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		server.close(() => {
			closeRegistry()
				.catch((error: unknown) => logger.error("Failed to close database pool", error))
				.finally(() => process.exit(0));
		});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((error) => {
	logger.error("Failed to start server", error);
	process.exit(1);
});

export { app, services };
