export interface TimelineEntry {
	actor: string;
	action: string;
	timestamp: number;
	comment: string;
}

export interface Incident {
	id: string;
	title: string;
	analyst: string;
	severity: string;
	category?: string;
	sourceIndicators: string[];
	destinationIndicators: string[];
	notable: Record<string, unknown>;
	techniqueIds: string[];
	timeline: TimelineEntry[];
	createdAt: number | null;
	closedAt: number;
}

export type KnowledgeStoreName = "procedures" | "techniques";

export interface RawDocument {
	id: string;
	title: string;
	text: string;
	source: string;
	metadata: Record<string, string>;
}

export interface KnowledgeChunk {
	documentId: string;
	sequence: number;
	text: string;
	contentHash: string;
	vector: number[];
	title: string;
	metadata: Record<string, string>;
	ingestedAt: number;
}

export interface ScoredChunk {
	chunk: KnowledgeChunk;
	score: number;
}

export interface RetrievedContext {
	procedures: ScoredChunk[];
	techniques: ScoredChunk[];
}

export interface QaScores {
	accuracy: number;
	procedure: number;
	documentation: number;
}

export interface QaReport {
	readonly incidentId: string;
	readonly scores: Readonly<QaScores>;
	readonly missedSteps: readonly string[];
	readonly escalationRequired: boolean;
	readonly summary: string;
	readonly recommendations: string;
	readonly generatedAt: string;
	readonly model: string;
}

export interface RunWatermark {
	pipeline: string;
	watermark: number;
}

export interface QaRunSummary {
	runId: string;
	windowStart: number;
	windowEnd: number;
	startedAt: number;
	finishedAt: number;
	processed: number;
	succeeded: number;
	failed: number;
}

export type IncidentStage = "retrieval" | "generation" | "delivery";

export interface IncidentFailure {
	runId: string;
	incidentId: string;
	stage: IncidentStage;
	kind: string;
	detail: string;
	rawOutput?: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
	return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
	return { ok: false, error };
}
