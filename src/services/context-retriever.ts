import { ResourceUnavailableError } from "../errors";
import type { KnowledgeStore } from "../knowledge/knowledge-store";
import type {
	Incident,
	KnowledgeStoreName,
	RetrievedContext,
	ScoredChunk,
} from "../types";
import { logger } from "../utils/logger";
import type { EmbeddingProvider } from "./embedding-service";

export interface RetrieverOptions {
	topK: number;
	minScore: number;
}

const FREE_TEXT_FIELDS = [
	"description",
	"rule_description",
	"signature",
	"message",
] as const;
const FREE_TEXT_LIMIT = 300;
// Extra candidates fetched so ties at the cut-off can be ordered locally.
const OVERSAMPLE = 2;

export function rankChunks(hits: ScoredChunk[], limit: number): ScoredChunk[] {
	return [...hits]
		.sort(
			(a, b) =>
				b.score - a.score ||
				b.chunk.ingestedAt - a.chunk.ingestedAt ||
				a.chunk.documentId.localeCompare(b.chunk.documentId) ||
				a.chunk.sequence - b.chunk.sequence,
		)
		.slice(0, limit);
}

export function buildProcedureQuery(incident: Incident): string {
	return [
		`SOC playbook for ${incident.title}`,
		incident.category ?? "",
		incident.techniqueIds.join(" "),
	]
		.map((part) => part.trim())
		.filter((part) => part.length > 0)
		.join(" ");
}

export function buildTechniqueQuery(incident: Incident): string {
	if (incident.techniqueIds.length > 0) {
		return `MITRE ATT&CK technique ${incident.techniqueIds.join(" ")}`;
	}
	const freeText = FREE_TEXT_FIELDS.map((field) => incident.notable[field])
		.filter((value): value is string => typeof value === "string")
		.map((value) => value.trim().slice(0, FREE_TEXT_LIMIT))
		.filter((value) => value.length > 0);
	return [
		incident.title,
		...freeText,
		"relevant MITRE ATT&CK technique mitigation tactic",
	].join(" ");
}

/**
 * Read-only lookups against both knowledge stores. Safe to call for several
 * incidents at once since stores are not written during a QA pass.
 */
export class ContextRetriever {
	constructor(
		private readonly stores: Record<KnowledgeStoreName, KnowledgeStore>,
		private readonly embedder: EmbeddingProvider,
		private readonly options: RetrieverOptions,
	) {}

	private async searchStore(
		store: KnowledgeStore,
		vector: number[],
	): Promise<ScoredChunk[]> {
		const hits = await store.search(vector, {
			limit: this.options.topK * OVERSAMPLE,
			minScore: this.options.minScore,
		});
		return rankChunks(
			hits.filter((hit) => hit.score >= this.options.minScore),
			this.options.topK,
		);
	}

	async ping(): Promise<void> {
		await this.embedder.ping();
	}

	async retrieve(incident: Incident): Promise<RetrievedContext> {
		const procedureQuery = buildProcedureQuery(incident);
		const techniqueQuery = buildTechniqueQuery(incident);
		const [procedureVector, techniqueVector] = await this.embedder.embedBatch([
			procedureQuery,
			techniqueQuery,
		]);
		if (!procedureVector || !techniqueVector) {
			throw new ResourceUnavailableError(
				"embedding provider",
				"no vectors returned for the incident queries",
			);
		}

		const [procedures, techniques] = await Promise.all([
			this.searchStore(this.stores.procedures, procedureVector),
			this.searchStore(this.stores.techniques, techniqueVector),
		]);

		logger.debug("Retrieved incident context", {
			incidentId: incident.id,
			procedures: procedures.length,
			techniques: techniques.length,
		});
		return { procedures, techniques };
	}
}
