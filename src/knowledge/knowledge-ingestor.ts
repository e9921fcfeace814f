import { z } from "zod";
import {
	IngestionInProgressError,
	MalformedDocumentError,
	ResourceUnavailableError,
} from "../errors";
import type { EmbeddingProvider } from "../services/embedding-service";
import type { KnowledgeChunk, KnowledgeStoreName, RawDocument } from "../types";
import { describeError, logger } from "../utils/logger";
import type { ChunkingPolicy } from "./chunker";
import { chunkText } from "./chunker";
import type { KnowledgeStore } from "./knowledge-store";

const RawDocumentSchema = z.object({
	id: z.string().trim().min(1, "document id is empty"),
	title: z.string(),
	text: z.string().refine((text) => text.trim().length > 0, "document text is empty"),
	source: z.string(),
	metadata: z.record(z.string()),
});

export interface IngestResult {
	store: KnowledgeStoreName;
	documents: {
		added: number;
		updated: number;
		unchanged: number;
		failed: number;
	};
	chunks: {
		added: number;
		skipped: number;
		removed: number;
		failed: number;
	};
	failedDocuments: Array<{ documentId: string; reason: string }>;
	storeUpdated: boolean;
	lastUpdated: number | null;
}

export interface IngestOptions {
	/** Drop the store and ingest from scratch (required after a model change). */
	rebuild?: boolean;
}

type DocumentOutcome =
	| { kind: "unchanged"; skipped: number }
	| {
			kind: "added" | "updated";
			added: number;
			skipped: number;
			removed: number;
	  };

function emptyResult(store: KnowledgeStoreName): IngestResult {
	return {
		store,
		documents: { added: 0, updated: 0, unchanged: 0, failed: 0 },
		chunks: { added: 0, skipped: 0, removed: 0, failed: 0 },
		failedDocuments: [],
		storeUpdated: false,
		lastUpdated: null,
	};
}

function asResourceError(store: KnowledgeStore, error: unknown): unknown {
	if (error instanceof ResourceUnavailableError) {
		return error;
	}
	return new ResourceUnavailableError(
		`knowledge store ${store.name}`,
		String(error),
		{ cause: error },
	);
}

/**
 * Turns raw documents into embedded chunks. Commits are per document, so a
 * failure part way through a batch leaves earlier documents in place.
 */
export class KnowledgeIngestor {
	private readonly active = new Set<KnowledgeStoreName>();

	constructor(
		private readonly embedder: EmbeddingProvider,
		private readonly policy: ChunkingPolicy,
		private readonly clock: () => number = () => Math.floor(Date.now() / 1000),
	) {}

	isRunning(store: KnowledgeStoreName): boolean {
		return this.active.has(store);
	}

	async ingest(
		documents: RawDocument[],
		store: KnowledgeStore,
		options: IngestOptions = {},
	): Promise<IngestResult> {
		if (this.active.has(store.name)) {
			throw new IngestionInProgressError(store.name);
		}
		this.active.add(store.name);
		try {
			return await this.runIngest(documents, store, options);
		} finally {
			this.active.delete(store.name);
		}
	}

	private async runIngest(
		documents: RawDocument[],
		store: KnowledgeStore,
		options: IngestOptions,
	): Promise<IngestResult> {
		const result = emptyResult(store.name);
		const now = this.clock();

		await store.open();
		const status = await store.getStatus().catch((error: unknown) => {
			throw asResourceError(store, error);
		});
		result.lastUpdated = status.lastUpdated;

		if (
			!options.rebuild &&
			status.embeddingModel !== null &&
			status.embeddingModel !== this.embedder.model
		) {
			throw new ResourceUnavailableError(
				`knowledge store ${store.name}`,
				`built with embedding model ${status.embeddingModel}; a full rebuild is required to use ${this.embedder.model}`,
			);
		}

		logger.info("Knowledge ingestion started", {
			store: store.name,
			documents: documents.length,
			rebuild: Boolean(options.rebuild),
		});

		if (options.rebuild) {
			await this.rebuildStore(documents, store, result, now);
		} else {
			await this.updateStore(documents, store, result, now);
		}

		const changed = result.chunks.added > 0 || result.chunks.removed > 0;
		if (result.documents.failed === 0 && changed) {
			await store.markUpdated(now, this.embedder.model).catch((error: unknown) => {
				throw asResourceError(store, error);
			});
			result.storeUpdated = true;
			result.lastUpdated = now;
		}

		logger.info("Knowledge ingestion finished", {
			store: store.name,
			documents: result.documents,
			chunks: result.chunks,
			storeUpdated: result.storeUpdated,
		});
		return result;
	}

	private async updateStore(
		documents: RawDocument[],
		store: KnowledgeStore,
		result: IngestResult,
		now: number,
	): Promise<void> {
		const seen = new Set<string>();
		for (const raw of documents) {
			let chunkCount = 0;
			try {
				const document = this.accept(raw, seen);
				const chunks = chunkText(document.text, this.policy);
				chunkCount = chunks.length;
				const outcome = await this.ingestDocument(document, chunks, store, now);

				if (outcome.kind === "unchanged") {
					result.documents.unchanged += 1;
					result.chunks.skipped += outcome.skipped;
					continue;
				}
				result.documents[outcome.kind] += 1;
				result.chunks.added += outcome.added;
				result.chunks.skipped += outcome.skipped;
				result.chunks.removed += outcome.removed;
			} catch (error) {
				this.recordFailure(error, raw, chunkCount, store, result);
			}
		}
	}

	/**
	 * Embeds the whole batch before the store is dropped, so a provider
	 * outage or a batch with nothing usable leaves the old collection intact.
	 */
	private async rebuildStore(
		documents: RawDocument[],
		store: KnowledgeStore,
		result: IngestResult,
		now: number,
	): Promise<void> {
		const staged: Array<{
			raw: RawDocument;
			document: RawDocument;
			upserts: KnowledgeChunk[];
		}> = [];
		const seen = new Set<string>();
		for (const raw of documents) {
			let chunkCount = 0;
			try {
				const document = this.accept(raw, seen);
				const chunks = chunkText(document.text, this.policy);
				chunkCount = chunks.length;
				const upserts = await this.embedChunks(document, chunks, now);
				staged.push({ raw, document, upserts });
			} catch (error) {
				this.recordFailure(error, raw, chunkCount, store, result);
			}
		}

		if (staged.length === 0) {
			logger.warn("Rebuild produced no documents; keeping the existing store", {
				store: store.name,
				failed: result.documents.failed,
			});
			return;
		}

		await store.reset().catch((error: unknown) => {
			throw asResourceError(store, error);
		});
		result.lastUpdated = null;

		for (const { raw, document, upserts } of staged) {
			try {
				await store.commitDocument(document.id, { upserts, chunkCount: upserts.length });
				result.documents.added += 1;
				result.chunks.added += upserts.length;
			} catch (error) {
				this.recordFailure(error, raw, upserts.length, store, result);
			}
		}
	}

	private accept(raw: RawDocument, seen: Set<string>): RawDocument {
		const document = this.validate(raw);
		if (seen.has(document.id)) {
			throw new MalformedDocumentError(document.id, "duplicate id in batch");
		}
		seen.add(document.id);
		return document;
	}

	private recordFailure(
		error: unknown,
		raw: RawDocument,
		chunkCount: number,
		store: KnowledgeStore,
		result: IngestResult,
	): void {
		const rawId = typeof raw?.id === "string" ? raw.id : "";
		if (error instanceof ResourceUnavailableError) {
			logger.error("Knowledge ingestion aborted", error, {
				store: store.name,
				documentId: rawId,
				committedDocuments: result.documents.added + result.documents.updated,
			});
			throw error;
		}
		const reason = describeError(error).error;
		result.documents.failed += 1;
		result.chunks.failed += chunkCount;
		result.failedDocuments.push({ documentId: rawId, reason: String(reason) });
		logger.warn("Skipping knowledge document", {
			store: store.name,
			documentId: rawId,
			reason,
		});
	}

	private validate(raw: RawDocument): RawDocument {
		const parsed = RawDocumentSchema.safeParse(raw);
		if (!parsed.success) {
			const id = typeof raw?.id === "string" ? raw.id : "";
			const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
			throw new MalformedDocumentError(id, reason);
		}
		return parsed.data;
	}

	private async ingestDocument(
		document: RawDocument,
		chunks: ReturnType<typeof chunkText>,
		store: KnowledgeStore,
		now: number,
	): Promise<DocumentOutcome> {
		const stored = await store.listDocumentChunks(document.id);
		const storedHashes = new Map(
			stored.map((state) => [state.sequence, state.contentHash]),
		);

		const changed = chunks.filter(
			(chunk) => storedHashes.get(chunk.sequence) !== chunk.contentHash,
		);
		const removed = stored.filter((state) => state.sequence >= chunks.length).length;
		const skipped = chunks.length - changed.length;

		if (changed.length === 0 && removed === 0) {
			return { kind: "unchanged", skipped };
		}

		const upserts = await this.embedChunks(document, changed, now);
		await store.commitDocument(document.id, {
			upserts,
			chunkCount: chunks.length,
		});

		return {
			kind: stored.length === 0 ? "added" : "updated",
			added: changed.length,
			skipped,
			removed,
		};
	}

	private async embedChunks(
		document: RawDocument,
		chunks: ReturnType<typeof chunkText>,
		now: number,
	): Promise<KnowledgeChunk[]> {
		const vectors = await this.embedder.embedBatch(chunks.map((chunk) => chunk.text));
		const upserts: KnowledgeChunk[] = chunks.map((chunk, idx) => ({
			documentId: document.id,
			sequence: chunk.sequence,
			text: chunk.text,
			contentHash: chunk.contentHash,
			vector: vectors[idx] ?? [],
			title: document.title,
			metadata: { ...document.metadata, source: document.source },
			ingestedAt: now,
		}));
		if (upserts.some((chunk) => chunk.vector.length === 0)) {
			throw new ResourceUnavailableError(
				"embedding provider",
				`missing vectors for document ${document.id}`,
			);
		}
		return upserts;
	}
}
