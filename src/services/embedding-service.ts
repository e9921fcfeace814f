import { z } from "zod";
import { ResourceUnavailableError } from "../errors";
import { chunkArray, mapWithConcurrency } from "../utils/concurrency";
import { sha256Hex } from "../utils/hash";
import { logger } from "../utils/logger";

export interface EmbeddingProvider {
	/** Model identifier recorded alongside every store built with it. */
	readonly model: string;
	embed(text: string): Promise<number[]>;
	embedBatch(texts: string[]): Promise<number[][]>;
	/** Fails with ResourceUnavailableError when the provider cannot embed. */
	ping(): Promise<void>;
}

export interface EmbeddingServiceOptions {
	url: string;
	model: string;
	timeoutMs: number;
	batchSize: number;
	maxConcurrency: number;
	cacheTtlSec: number;
	maxRetries: number;
}

const EmbeddingResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
});

const PING_TEXT = "ping";

interface PendingText {
	text: string;
	indices: number[];
}

export class EmbeddingService implements EmbeddingProvider {
	readonly model: string;
	private readonly options: EmbeddingServiceOptions;
	private embeddingCache = new Map<
		string,
		{ vector: number[]; expiresAt: number }
	>();
	private dimension: number | null = null;

	constructor(options: EmbeddingServiceOptions) {
		this.options = options;
		this.model = options.model;
	}

	private normalizeEmbeddingText(text: string): string {
		return text.trim().replace(/\s+/g, " ");
	}

	private cacheKey(text: string): string {
		return sha256Hex(this.normalizeEmbeddingText(text));
	}

	private getCachedEmbedding(text: string): number[] | null {
		const key = this.cacheKey(text);
		const cached = this.embeddingCache.get(key);
		const now = Math.floor(Date.now() / 1000);
		if (!cached) {
			return null;
		}
		if (cached.expiresAt <= now) {
			this.embeddingCache.delete(key);
			return null;
		}
		return cached.vector;
	}

	private cacheEmbedding(text: string, vector: number[]): void {
		this.embeddingCache.set(this.cacheKey(text), {
			vector,
			expiresAt: Math.floor(Date.now() / 1000) + this.options.cacheTtlSec,
		});
	}

	private async requestEmbeddingBatch(texts: string[]): Promise<number[][]> {
		const response = await fetch(`${this.options.url}/embeddings`, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify({ input: texts, model: this.model }),
			signal: AbortSignal.timeout(this.options.timeoutMs),
		});

		if (!response.ok) {
			throw new Error(`embedding service returned ${response.status}`);
		}

		const data = EmbeddingResponseSchema.safeParse(await response.json());
		if (!data.success || data.data.embeddings.length !== texts.length) {
			throw new Error("embedding service returned invalid batch shape");
		}

		const vectors: number[][] = [];
		for (const row of data.data.embeddings) {
			if (this.dimension !== null && row.length !== this.dimension) {
				throw new Error(
					`embedding dimension changed from ${this.dimension} to ${row.length}`,
				);
			}
			this.dimension = row.length;
			vectors.push(row);
		}
		return vectors;
	}

	private async requestWithRetries(texts: string[]): Promise<number[][]> {
		let lastError: unknown;
		for (let attempt = 0; attempt <= this.options.maxRetries; attempt++) {
			try {
				return await this.requestEmbeddingBatch(texts);
			} catch (error) {
				lastError = error;
				logger.warn("Embedding batch attempt failed", {
					attempt: attempt + 1,
					batchSize: texts.length,
					error: String(error),
				});
			}
		}
		throw new ResourceUnavailableError(
			"embedding provider",
			String(lastError),
			{ cause: lastError },
		);
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		const vectors: number[][] = new Array(texts.length);
		const byNormalized = new Map<string, PendingText>();

		texts.forEach((text, index) => {
			const cached = this.getCachedEmbedding(text);
			if (cached) {
				vectors[index] = cached;
				return;
			}
			const normalized = this.normalizeEmbeddingText(text);
			const existing = byNormalized.get(normalized);
			if (existing) {
				existing.indices.push(index);
				return;
			}
			byNormalized.set(normalized, { text, indices: [index] });
		});

		const unresolved = Array.from(byNormalized.values());
		if (unresolved.length === 0) {
			return vectors;
		}

		await mapWithConcurrency(
			chunkArray(unresolved, this.options.batchSize),
			this.options.maxConcurrency,
			async (chunk) => {
				const batchVectors = await this.requestWithRetries(
					chunk.map((item) => item.text),
				);
				chunk.forEach((item, idx) => {
					const vector = batchVectors[idx];
					if (!vector) {
						return;
					}
					this.cacheEmbedding(item.text, vector);
					for (const originalIndex of item.indices) {
						vectors[originalIndex] = vector;
					}
				});
			},
		);

		return vectors;
	}

	async ping(): Promise<void> {
		// Skips the cache so a warm process still reaches the provider.
		await this.requestWithRetries([PING_TEXT]);
	}

	async embed(text: string): Promise<number[]> {
		const [vector] = await this.embedBatch([text]);
		if (!vector) {
			throw new ResourceUnavailableError(
				"embedding provider",
				"no vector returned",
			);
		}
		return vector;
	}
}
