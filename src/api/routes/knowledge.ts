import { Hono } from "hono";
import { z } from "zod";
import type { KnowledgeUpdateJob } from "../../jobs/knowledge-update-job";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		knowledgeUpdateJob: KnowledgeUpdateJob;
	}
}

const StoreNameSchema = z.enum(["procedures", "techniques"]);

const UpdateRequestSchema = z.object({
	force: z.boolean().optional(),
	rebuild: z.boolean().optional(),
});

app.post("/:store/update", async (c) => {
	const store = StoreNameSchema.safeParse(c.req.param("store"));
	if (!store.success) {
		return c.json({ error: "unknown_store" }, 404);
	}

	const body = await c.req.json().catch(() => ({}));
	const request = UpdateRequestSchema.safeParse(body);
	if (!request.success) {
		return c.json({ error: "Invalid request", details: request.error }, 400);
	}

	const outcome = await c.get("knowledgeUpdateJob").run(store.data, request.data);
	return c.json({ status: "ok", ...outcome });
});

app.get("/:store", async (c) => {
	const store = StoreNameSchema.safeParse(c.req.param("store"));
	if (!store.success) {
		return c.json({ error: "unknown_store" }, 404);
	}
	const job = c.get("knowledgeUpdateJob");
	const status = await job.status(store.data);
	return c.json({ ...status, updating: job.isRunning(store.data) });
});

export const knowledgeRoutes = app;
