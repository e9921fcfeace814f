import type {
	KnowledgeChunk,
	KnowledgeStoreName,
	ScoredChunk,
} from "../types";

export interface StoredChunkState {
	sequence: number;
	contentHash: string;
}

export interface DocumentCommit {
	/** New or changed chunks; unchanged ones are left as stored. */
	upserts: KnowledgeChunk[];
	/** Chunks at this sequence or later are removed in the same commit. */
	chunkCount: number;
}

export interface SearchOptions {
	limit: number;
	minScore: number;
}

export interface KnowledgeStoreStatus {
	name: KnowledgeStoreName;
	chunkCount: number;
	lastUpdated: number | null;
	/** Last time the store was compared with its source, changed or not. */
	lastChecked: number | null;
	embeddingModel: string | null;
}

export interface KnowledgeStoreMetadata {
	lastUpdated: number | null;
	lastChecked: number | null;
	embeddingModel: string | null;
}

export interface KnowledgeStoreMetadataRepository {
	get(name: KnowledgeStoreName): Promise<KnowledgeStoreMetadata>;
	save(
		name: KnowledgeStoreName,
		lastUpdated: number,
		embeddingModel: string,
	): Promise<void>;
	/** No-op for a store without saved metadata. */
	touch(name: KnowledgeStoreName, checkedAt: number): Promise<void>;
	clear(name: KnowledgeStoreName): Promise<void>;
}

/**
 * A persisted collection of embedded chunks. The ingestor is the only writer;
 * readers see each document either before or after a commit.
 */
export interface KnowledgeStore {
	readonly name: KnowledgeStoreName;
	open(): Promise<void>;
	listDocumentChunks(documentId: string): Promise<StoredChunkState[]>;
	commitDocument(documentId: string, commit: DocumentCommit): Promise<void>;
	search(vector: number[], options: SearchOptions): Promise<ScoredChunk[]>;
	getStatus(): Promise<KnowledgeStoreStatus>;
	markUpdated(at: number, embeddingModel: string): Promise<void>;
	markChecked(at: number): Promise<void>;
	reset(): Promise<void>;
}
