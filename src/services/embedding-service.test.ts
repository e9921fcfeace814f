import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ResourceUnavailableError } from "../errors";
import type { EmbeddingServiceOptions } from "./embedding-service";
import { EmbeddingService } from "./embedding-service";

const fetchMock = vi.fn<typeof fetch>();

beforeEach(() => {
	fetchMock.mockReset();
	vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
	vi.unstubAllGlobals();
});

function service(overrides: Partial<EmbeddingServiceOptions> = {}) {
	return new EmbeddingService({
		url: "http://embed.test/v1",
		model: "test-embed",
		timeoutMs: 1000,
		batchSize: 8,
		maxConcurrency: 1,
		cacheTtlSec: 60,
		maxRetries: 0,
		...overrides,
	});
}

describe("EmbeddingService", () => {
	it("embeds each distinct text once and caches the result", async () => {
		fetchMock.mockResolvedValueOnce(Response.json({ embeddings: [[1, 0], [0, 1]] }));
		const embedder = service();

		await expect(embedder.embedBatch(["alpha", " alpha ", "beta"])).resolves.toEqual([
			[1, 0],
			[1, 0],
			[0, 1],
		]);
		await expect(embedder.embed("alpha  ")).resolves.toEqual([1, 0]);

		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe("http://embed.test/v1/embeddings");
		expect(JSON.parse(String(init?.body))).toEqual({ input: ["alpha", "beta"], model: "test-embed" });
	});

	it("splits work into batches", async () => {
		fetchMock
			.mockResolvedValueOnce(Response.json({ embeddings: [[1], [2]] }))
			.mockResolvedValueOnce(Response.json({ embeddings: [[3]] }));

		await expect(service({ batchSize: 2 }).embedBatch(["a", "b", "c"])).resolves.toEqual([[1], [2], [3]]);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("retries a failing batch before giving up", async () => {
		fetchMock.mockImplementation(async () => new Response("", { status: 500 }));

		await expect(service({ maxRetries: 1 }).embed("alpha")).rejects.toBeInstanceOf(ResourceUnavailableError);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("rejects a response with the wrong number of vectors", async () => {
		fetchMock.mockResolvedValueOnce(Response.json({ embeddings: [[1, 0]] }));

		await expect(service().embedBatch(["a", "b"])).rejects.toThrow(
			"embedding provider unavailable: Error: embedding service returned invalid batch shape",
		);
	});

	it("pings the provider even when the cache is warm", async () => {
		fetchMock
			.mockResolvedValueOnce(Response.json({ embeddings: [[1, 0]] }))
			.mockResolvedValueOnce(Response.json({ embeddings: [[0, 1]] }));
		const embedder = service();

		await embedder.embed("ping");
		await expect(embedder.ping()).resolves.toBeUndefined();
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("reports an unreachable provider from ping", async () => {
		fetchMock.mockRejectedValue(new TypeError("fetch failed"));

		await expect(service().ping()).rejects.toThrow(
			"embedding provider unavailable: TypeError: fetch failed",
		);
	});
});
