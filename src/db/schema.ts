import {
	bigint,
	integer,
	pgTable,
	serial,
	text,
	timestamp,
} from "drizzle-orm/pg-core";

// Last processed closure boundary per pipeline; only ever moves forward
export const runWatermarks = pgTable("run_watermarks", {
	pipeline: text("pipeline").primaryKey(),
	watermark: bigint("watermark", { mode: "number" }).notNull(),
	updatedAt: timestamp("updated_at").defaultNow(),
});

export const qaRuns = pgTable("qa_runs", {
	id: serial("id").primaryKey(),
	runId: text("run_id").notNull().unique(),
	status: text("status").notNull(), // 'completed' | 'failed'
	windowStart: bigint("window_start", { mode: "number" }).notNull(),
	windowEnd: bigint("window_end", { mode: "number" }),
	startedAt: bigint("started_at", { mode: "number" }).notNull(),
	finishedAt: bigint("finished_at", { mode: "number" }).notNull(),
	processed: integer("processed").notNull().default(0),
	succeeded: integer("succeeded").notNull().default(0),
	failed: integer("failed").notNull().default(0),
	error: text("error"),
	createdAt: timestamp("created_at").defaultNow(),
});

// Per-incident diagnostics, kept out of the delivered reports
export const qaIncidentFailures = pgTable("qa_incident_failures", {
	id: serial("id").primaryKey(),
	runId: text("run_id").notNull(),
	incidentId: text("incident_id").notNull(),
	stage: text("stage").notNull(),
	kind: text("kind").notNull(),
	detail: text("detail").notNull(),
	rawOutput: text("raw_output"),
	createdAt: timestamp("created_at").defaultNow(),
});

export const knowledgeStores = pgTable("knowledge_stores", {
	name: text("name").primaryKey(),
	lastUpdated: bigint("last_updated", { mode: "number" }).notNull(),
	lastChecked: bigint("last_checked", { mode: "number" }),
	embeddingModel: text("embedding_model").notNull(),
	updatedAt: timestamp("updated_at").defaultNow(),
});

export type RunWatermarkRow = typeof runWatermarks.$inferSelect;
export type QaRunRow = typeof qaRuns.$inferSelect;
export type QaIncidentFailureRow = typeof qaIncidentFailures.$inferSelect;
export type KnowledgeStoreRow = typeof knowledgeStores.$inferSelect;
