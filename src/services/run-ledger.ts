import * as registry from "../db/registry";
import type {
	KnowledgeStoreMetadata,
	KnowledgeStoreMetadataRepository,
} from "../knowledge/knowledge-store";
import type {
	IncidentFailure,
	IncidentStage,
	KnowledgeStoreName,
	RunWatermark,
} from "../types";

export type QaRunStatus = "completed" | "failed";

export interface QaRunRecord {
	runId: string;
	status: QaRunStatus;
	windowStart: number;
	windowEnd: number | null;
	startedAt: number;
	finishedAt: number;
	processed: number;
	succeeded: number;
	failed: number;
	error: string | null;
}

/** Durable state of the QA pipeline between runs. */
export interface RunLedger {
	getWatermark(pipeline: string): Promise<RunWatermark | null>;
	/** Never lowers a stored watermark; resolves to the value now stored. */
	advanceWatermark(pipeline: string, watermark: number): Promise<RunWatermark>;
	recordRun(run: QaRunRecord): Promise<void>;
	recordFailures(failures: IncidentFailure[]): Promise<void>;
	listRuns(limit: number): Promise<QaRunRecord[]>;
	listFailures(runId: string): Promise<IncidentFailure[]>;
}

const STAGES: readonly IncidentStage[] = ["retrieval", "generation", "delivery"];

function toStage(value: string): IncidentStage {
	return STAGES.find((stage) => stage === value) ?? "generation";
}

function toStatus(value: string): QaRunStatus {
	return value === "completed" ? "completed" : "failed";
}

export class PostgresRunLedger implements RunLedger {
	async getWatermark(pipeline: string): Promise<RunWatermark | null> {
		const watermark = await registry.getWatermark(pipeline);
		return watermark === null ? null : { pipeline, watermark };
	}

	async advanceWatermark(pipeline: string, watermark: number): Promise<RunWatermark> {
		const stored = await registry.advanceWatermark(pipeline, watermark);
		return { pipeline, watermark: stored };
	}

	async recordRun(run: QaRunRecord): Promise<void> {
		await registry.saveQaRun(run);
	}

	async recordFailures(failures: IncidentFailure[]): Promise<void> {
		await registry.saveIncidentFailures(failures);
	}

	async listRuns(limit: number): Promise<QaRunRecord[]> {
		const rows = await registry.listQaRuns(limit);
		return rows.map((row) => ({
			runId: row.runId,
			status: toStatus(row.status),
			windowStart: row.windowStart,
			windowEnd: row.windowEnd,
			startedAt: row.startedAt,
			finishedAt: row.finishedAt,
			processed: row.processed,
			succeeded: row.succeeded,
			failed: row.failed,
			error: row.error,
		}));
	}

	async listFailures(runId: string): Promise<IncidentFailure[]> {
		const rows = await registry.listIncidentFailures(runId);
		return rows.map((row) => ({
			runId: row.runId,
			incidentId: row.incidentId,
			stage: toStage(row.stage),
			kind: row.kind,
			detail: row.detail,
			...(row.rawOutput === null ? {} : { rawOutput: row.rawOutput }),
		}));
	}
}

export class PostgresKnowledgeStoreMetadata implements KnowledgeStoreMetadataRepository {
	async get(name: KnowledgeStoreName): Promise<KnowledgeStoreMetadata> {
		const row = await registry.getKnowledgeStoreMetadata(name);
		return {
			lastUpdated: row?.lastUpdated ?? null,
			lastChecked: row?.lastChecked ?? row?.lastUpdated ?? null,
			embeddingModel: row?.embeddingModel ?? null,
		};
	}

	async save(
		name: KnowledgeStoreName,
		lastUpdated: number,
		embeddingModel: string,
	): Promise<void> {
		await registry.saveKnowledgeStoreMetadata(name, lastUpdated, embeddingModel);
	}

	async touch(name: KnowledgeStoreName, checkedAt: number): Promise<void> {
		await registry.touchKnowledgeStoreMetadata(name, checkedAt);
	}

	async clear(name: KnowledgeStoreName): Promise<void> {
		await registry.deleteKnowledgeStoreMetadata(name);
	}
}
