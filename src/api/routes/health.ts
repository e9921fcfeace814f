import { Hono } from "hono";
import type { QaPipeline } from "../../services/qa-pipeline";

const app = new Hono();
const SERVICE_VERSION = "1.0.0";

declare module "hono" {
	interface ContextVariableMap {
		qaPipeline: QaPipeline;
	}
}

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: "soc-qa-review",
		version: SERVICE_VERSION,
	});
});

app.get("/health", (c) => {
	return c.json({
		status: "healthy",
		version: SERVICE_VERSION,
		pipeline_state: c.get("qaPipeline").state,
		timestamp: new Date().toISOString(),
	});
});

export const healthRoutes = app;
