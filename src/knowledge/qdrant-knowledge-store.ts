import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import { ResourceUnavailableError } from "../errors";
import type { KnowledgeChunk, KnowledgeStoreName, ScoredChunk } from "../types";
import { stableUuid } from "../utils/hash";
import { logger } from "../utils/logger";
import type {
	DocumentCommit,
	KnowledgeStore,
	KnowledgeStoreMetadataRepository,
	KnowledgeStoreStatus,
	SearchOptions,
	StoredChunkState,
} from "./knowledge-store";

type PayloadIndexFieldSchema = Parameters<
	QdrantClient["createPayloadIndex"]
>[1]["field_schema"];

const ChunkPayloadSchema = z.object({
	document_id: z.string(),
	sequence: z.number().int().nonnegative(),
	text: z.string(),
	content_hash: z.string(),
	title: z.string().default(""),
	metadata: z.record(z.string()).default({}),
	ingested_at: z.number(),
});

const ChunkStateSchema = ChunkPayloadSchema.pick({
	sequence: true,
	content_hash: true,
});

const VectorSchema = z.array(z.number());

const SCROLL_PAGE_SIZE = 256;

export interface QdrantKnowledgeStoreOptions {
	name: KnowledgeStoreName;
	collection: string;
	client: QdrantClient;
	metadata: KnowledgeStoreMetadataRepository;
}

export function createQdrantClient(options: {
	host: string;
	port: number;
	apiKey?: string;
}): QdrantClient {
	return new QdrantClient({
		url: `http://${options.host}:${options.port}`,
		apiKey: options.apiKey,
	});
}

export class QdrantKnowledgeStore implements KnowledgeStore {
	readonly name: KnowledgeStoreName;
	private readonly collection: string;
	private readonly client: QdrantClient;
	private readonly metadata: KnowledgeStoreMetadataRepository;
	private exists = false;

	constructor(options: QdrantKnowledgeStoreOptions) {
		this.name = options.name;
		this.collection = options.collection;
		this.client = options.client;
		this.metadata = options.metadata;
	}

	private isNotFoundError(error: unknown): boolean {
		const message = String(error ?? "").toLowerCase();
		return message.includes("404") || message.includes("not found");
	}

	private unavailable(action: string, error: unknown): ResourceUnavailableError {
		return new ResourceUnavailableError(
			`knowledge store ${this.name}`,
			`${action} failed: ${String(error)}`,
			{ cause: error },
		);
	}

	private pointId(documentId: string, sequence: number): string {
		return stableUuid(`${this.name}:${documentId}:${sequence}`);
	}

	async open(): Promise<void> {
		try {
			await this.client.getCollection(this.collection);
			this.exists = true;
		} catch (error) {
			if (!this.isNotFoundError(error)) {
				throw this.unavailable("open", error);
			}
			// Not built yet: reads return nothing until the first ingestion.
			this.exists = false;
			logger.warn("Knowledge store collection missing", {
				store: this.name,
				collection: this.collection,
			});
		}
	}

	private async ensurePayloadIndex(
		field_name: string,
		field_schema: PayloadIndexFieldSchema,
	): Promise<void> {
		try {
			await this.client.createPayloadIndex(this.collection, {
				field_name,
				field_schema,
				wait: true,
			});
		} catch (error) {
			logger.warn("Skipping payload index creation", {
				collection: this.collection,
				field_name,
				error: String(error),
			});
		}
	}

	private async ensureCollection(dimension: number): Promise<void> {
		if (this.exists) {
			return;
		}
		await this.open();
		if (this.exists) {
			return;
		}

		logger.info("Creating knowledge store collection", {
			store: this.name,
			collection: this.collection,
			dimension,
		});
		try {
			await this.client.createCollection(this.collection, {
				vectors: {
					size: dimension,
					distance: "Cosine",
				},
				replication_factor: 1,
				shard_number: 1,
			});
		} catch (error) {
			throw this.unavailable("create collection", error);
		}
		this.exists = true;

		await this.ensurePayloadIndex("document_id", "keyword");
		await this.ensurePayloadIndex("sequence", "integer");
	}

	async listDocumentChunks(documentId: string): Promise<StoredChunkState[]> {
		if (!this.exists) {
			return [];
		}

		const states: StoredChunkState[] = [];
		let offset: string | number | undefined;
		try {
			do {
				const page = await this.client.scroll(this.collection, {
					filter: {
						must: [{ key: "document_id", match: { value: documentId } }],
					},
					limit: SCROLL_PAGE_SIZE,
					offset,
					with_payload: ["sequence", "content_hash"],
					with_vector: false,
				});
				for (const point of page.points) {
					const parsed = ChunkStateSchema.safeParse(point.payload);
					if (parsed.success) {
						states.push({
							sequence: parsed.data.sequence,
							contentHash: parsed.data.content_hash,
						});
					}
				}
				const next = page.next_page_offset;
				offset =
					typeof next === "string" || typeof next === "number"
						? next
						: undefined;
			} while (offset !== undefined);
		} catch (error) {
			throw this.unavailable("scroll", error);
		}

		return states.sort((a, b) => a.sequence - b.sequence);
	}

	async commitDocument(documentId: string, commit: DocumentCommit): Promise<void> {
		const first = commit.upserts[0];
		if (first) {
			await this.ensureCollection(first.vector.length);
		} else if (!this.exists) {
			return;
		}

		const points = commit.upserts.map((chunk) => ({
			id: this.pointId(chunk.documentId, chunk.sequence),
			vector: chunk.vector,
			payload: {
				document_id: chunk.documentId,
				sequence: chunk.sequence,
				text: chunk.text,
				content_hash: chunk.contentHash,
				title: chunk.title,
				metadata: chunk.metadata,
				ingested_at: chunk.ingestedAt,
			},
		}));

		// One request per document: upsert changed chunks and drop the tail.
		try {
			await this.client.batchUpdate(this.collection, {
				wait: true,
				operations: [
					...(points.length > 0 ? [{ upsert: { points } }] : []),
					{
						delete: {
							filter: {
								must: [
									{ key: "document_id", match: { value: documentId } },
									{ key: "sequence", range: { gte: commit.chunkCount } },
								],
							},
						},
					},
				],
			});
		} catch (error) {
			throw this.unavailable("commit", error);
		}
	}

	async search(vector: number[], options: SearchOptions): Promise<ScoredChunk[]> {
		if (!this.exists) {
			return [];
		}

		let hits: Awaited<ReturnType<QdrantClient["search"]>>;
		try {
			hits = await this.client.search(this.collection, {
				vector,
				limit: options.limit,
				score_threshold: options.minScore,
				with_payload: true,
				with_vector: true,
			});
		} catch (error) {
			throw this.unavailable("search", error);
		}

		const results: ScoredChunk[] = [];
		for (const hit of hits) {
			const payload = ChunkPayloadSchema.safeParse(hit.payload);
			const hitVector = VectorSchema.safeParse(hit.vector);
			if (!payload.success) {
				logger.warn("Dropping knowledge point with invalid payload", {
					store: this.name,
					pointId: String(hit.id),
				});
				continue;
			}
			const chunk: KnowledgeChunk = {
				documentId: payload.data.document_id,
				sequence: payload.data.sequence,
				text: payload.data.text,
				contentHash: payload.data.content_hash,
				vector: hitVector.success ? hitVector.data : [],
				title: payload.data.title,
				metadata: payload.data.metadata,
				ingestedAt: payload.data.ingested_at,
			};
			results.push({ chunk, score: hit.score });
		}
		return results;
	}

	async getStatus(): Promise<KnowledgeStoreStatus> {
		const meta = await this.metadata.get(this.name);
		let chunkCount = 0;
		if (this.exists) {
			try {
				const result = await this.client.count(this.collection, { exact: true });
				chunkCount = result.count;
			} catch (error) {
				throw this.unavailable("count", error);
			}
		}
		return {
			name: this.name,
			chunkCount,
			lastUpdated: meta.lastUpdated,
			lastChecked: meta.lastChecked,
			embeddingModel: meta.embeddingModel,
		};
	}

	async markUpdated(at: number, embeddingModel: string): Promise<void> {
		await this.metadata.save(this.name, at, embeddingModel);
	}

	async markChecked(at: number): Promise<void> {
		await this.metadata.touch(this.name, at);
	}

	async reset(): Promise<void> {
		await this.open();
		if (this.exists) {
			logger.warn("Dropping knowledge store collection for rebuild", {
				store: this.name,
				collection: this.collection,
			});
			try {
				await this.client.deleteCollection(this.collection);
			} catch (error) {
				throw this.unavailable("delete collection", error);
			}
		}
		this.exists = false;
		await this.metadata.clear(this.name);
	}
}
