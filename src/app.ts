import { Hono } from "hono";
import { healthRoutes } from "./api/routes/health";
import { knowledgeRoutes } from "./api/routes/knowledge";
import { runRoutes } from "./api/routes/runs";
import {
	IngestionInProgressError,
	ResourceUnavailableError,
	RunInProgressError,
} from "./errors";
import type { KnowledgeUpdateJob } from "./jobs/knowledge-update-job";
import type { QaRunJob } from "./jobs/qa-run-job";
import type { QaPipeline } from "./services/qa-pipeline";
import type { RunLedger } from "./services/run-ledger";
import { logger } from "./utils/logger";

export interface AppServices {
	qaPipeline: QaPipeline;
	qaRunJob: QaRunJob;
	runLedger: RunLedger;
	knowledgeUpdateJob: KnowledgeUpdateJob;
}

export function createApp(services: AppServices): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		if (err instanceof RunInProgressError || err instanceof IngestionInProgressError) {
			return c.json({ error: "conflict", message: err.message }, 409);
		}
		if (err instanceof ResourceUnavailableError) {
			logger.warn("Request failed on unavailable resource", {
				resource: err.resource,
				error: err.message,
			});
			return c.json({ error: "resource_unavailable", resource: err.resource, message: err.message }, 503);
		}
		logger.error("Unhandled request error", err);
		return c.json({ error: "internal_error" }, 500);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	// Middleware to inject services
	app.use("*", async (c, next) => {
		c.set("qaPipeline", services.qaPipeline);
		c.set("qaRunJob", services.qaRunJob);
		c.set("runLedger", services.runLedger);
		c.set("knowledgeUpdateJob", services.knowledgeUpdateJob);
		await next();
	});

	app.route("/", healthRoutes);
	app.route("/runs", runRoutes);
	app.route("/knowledge", knowledgeRoutes);

	return app;
}
