import { desc, eq, sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { settings } from "../config/settings";
import type { QaIncidentFailureRow, QaRunRow } from "./schema";
import * as schema from "./schema";

const pool = new Pool({
	host: settings.postgres.host,
	port: settings.postgres.port,
	database: settings.postgres.database,
	user: settings.postgres.user,
	password: settings.postgres.password,
	ssl: false,
});

export const db = drizzle(pool, { schema });

export async function initializeRegistry(): Promise<void> {
	await pool.query(`
		CREATE TABLE IF NOT EXISTS run_watermarks (
			pipeline TEXT PRIMARY KEY,
			watermark BIGINT NOT NULL,
			updated_at TIMESTAMP DEFAULT NOW()
		);

		CREATE TABLE IF NOT EXISTS qa_runs (
			id SERIAL PRIMARY KEY,
			run_id TEXT NOT NULL UNIQUE,
			status TEXT NOT NULL,
			window_start BIGINT NOT NULL,
			window_end BIGINT,
			started_at BIGINT NOT NULL,
			finished_at BIGINT NOT NULL,
			processed INTEGER NOT NULL DEFAULT 0,
			succeeded INTEGER NOT NULL DEFAULT 0,
			failed INTEGER NOT NULL DEFAULT 0,
			error TEXT,
			created_at TIMESTAMP DEFAULT NOW()
		);

		CREATE TABLE IF NOT EXISTS qa_incident_failures (
			id SERIAL PRIMARY KEY,
			run_id TEXT NOT NULL,
			incident_id TEXT NOT NULL,
			stage TEXT NOT NULL,
			kind TEXT NOT NULL,
			detail TEXT NOT NULL,
			raw_output TEXT,
			created_at TIMESTAMP DEFAULT NOW()
		);

		CREATE INDEX IF NOT EXISTS qa_incident_failures_run_id_idx
			ON qa_incident_failures (run_id);

		CREATE TABLE IF NOT EXISTS knowledge_stores (
			name TEXT PRIMARY KEY,
			last_updated BIGINT NOT NULL,
			last_checked BIGINT,
			embedding_model TEXT NOT NULL,
			updated_at TIMESTAMP DEFAULT NOW()
		);

		ALTER TABLE knowledge_stores ADD COLUMN IF NOT EXISTS last_checked BIGINT;
	`);
}

export async function closeRegistry(): Promise<void> {
	await pool.end();
}

// Watermark functions
export async function getWatermark(pipeline: string): Promise<number | null> {
	const row = await db.query.runWatermarks.findFirst({
		where: eq(schema.runWatermarks.pipeline, pipeline),
	});
	return row ? row.watermark : null;
}

/** Stores the boundary unless a later one is already recorded; returns the stored value. */
export async function advanceWatermark(
	pipeline: string,
	watermark: number,
): Promise<number> {
	const rows = await db
		.insert(schema.runWatermarks)
		.values({ pipeline, watermark })
		.onConflictDoUpdate({
			target: schema.runWatermarks.pipeline,
			set: {
				watermark: sql`GREATEST(${schema.runWatermarks.watermark}, excluded.watermark)`,
				updatedAt: new Date(),
			},
		})
		.returning({ watermark: schema.runWatermarks.watermark });
	return rows[0]?.watermark ?? watermark;
}

// Run history functions
export interface QaRunInput {
	runId: string;
	status: "completed" | "failed";
	windowStart: number;
	windowEnd: number | null;
	startedAt: number;
	finishedAt: number;
	processed: number;
	succeeded: number;
	failed: number;
	error?: string | null;
}

export async function saveQaRun(input: QaRunInput): Promise<void> {
	await db.insert(schema.qaRuns).values({
		runId: input.runId,
		status: input.status,
		windowStart: input.windowStart,
		windowEnd: input.windowEnd,
		startedAt: input.startedAt,
		finishedAt: input.finishedAt,
		processed: input.processed,
		succeeded: input.succeeded,
		failed: input.failed,
		error: input.error ?? null,
	});
}

export async function listQaRuns(limit: number): Promise<QaRunRow[]> {
	return db.query.qaRuns.findMany({
		orderBy: [desc(schema.qaRuns.id)],
		limit,
	});
}

export interface IncidentFailureInput {
	runId: string;
	incidentId: string;
	stage: string;
	kind: string;
	detail: string;
	rawOutput?: string;
}

export async function saveIncidentFailures(
	failures: IncidentFailureInput[],
): Promise<void> {
	if (failures.length === 0) {
		return;
	}
	await db.insert(schema.qaIncidentFailures).values(
		failures.map((failure) => ({
			runId: failure.runId,
			incidentId: failure.incidentId,
			stage: failure.stage,
			kind: failure.kind,
			detail: failure.detail,
			rawOutput: failure.rawOutput ?? null,
		})),
	);
}

export async function listIncidentFailures(
	runId: string,
): Promise<QaIncidentFailureRow[]> {
	return db.query.qaIncidentFailures.findMany({
		where: eq(schema.qaIncidentFailures.runId, runId),
		orderBy: [schema.qaIncidentFailures.id],
	});
}

// Knowledge store metadata functions
export async function getKnowledgeStoreMetadata(name: string) {
	return db.query.knowledgeStores.findFirst({
		where: eq(schema.knowledgeStores.name, name),
	});
}

export async function saveKnowledgeStoreMetadata(
	name: string,
	lastUpdated: number,
	embeddingModel: string,
): Promise<void> {
	await db
		.insert(schema.knowledgeStores)
		.values({ name, lastUpdated, lastChecked: lastUpdated, embeddingModel })
		.onConflictDoUpdate({
			target: schema.knowledgeStores.name,
			set: {
				lastUpdated,
				lastChecked: lastUpdated,
				embeddingModel,
				updatedAt: new Date(),
			},
		});
}

export async function touchKnowledgeStoreMetadata(
	name: string,
	checkedAt: number,
): Promise<void> {
	await db
		.update(schema.knowledgeStores)
		.set({ lastChecked: checkedAt, updatedAt: new Date() })
		.where(eq(schema.knowledgeStores.name, name));
}

export async function deleteKnowledgeStoreMetadata(name: string): Promise<void> {
	await db
		.delete(schema.knowledgeStores)
		.where(eq(schema.knowledgeStores.name, name));
}
