import { Hono } from "hono";
import type { QaRunJob } from "../../jobs/qa-run-job";
import type { RunLedger } from "../../services/run-ledger";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		qaRunJob: QaRunJob;
		runLedger: RunLedger;
	}
}

app.post("/qa", async (c) => {
	const outcome = await c.get("qaRunJob").run();
	return c.json({
		status: "ok",
		summary: outcome.summary,
		watermark: outcome.watermark.watermark,
	});
});

app.get("/watermark", async (c) => {
	const pipeline = c.get("qaPipeline").pipeline;
	const watermark = await c.get("runLedger").getWatermark(pipeline);
	return c.json({ pipeline, watermark: watermark?.watermark ?? null });
});

app.get("/:runId/failures", async (c) => {
	const runId = c.req.param("runId");
	const failures = await c.get("runLedger").listFailures(runId);
	return c.json({ run_id: runId, failures });
});

app.get("/", async (c) => {
	const parsed = Number(c.req.query("limit") ?? "20");
	const limit = Number.isFinite(parsed) ? Math.min(Math.max(Math.floor(parsed), 1), 200) : 20;
	const runs = await c.get("runLedger").listRuns(limit);
	return c.json({ runs });
});

export const runRoutes = app;
