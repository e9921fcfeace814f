import { z } from "zod";
import { ResourceUnavailableError, isAbortError } from "../errors";
import { logger } from "../utils/logger";

export interface LlmClient {
	readonly model: string;
	/** Checks the endpoint is reachable and serves the configured model. */
	ping(): Promise<void>;
	complete(prompt: string, temperature: number, timeoutSeconds: number): Promise<string>;
}

export class LlmCallError extends Error {
	readonly reason: "timeout" | "transport" | "malformed";

	constructor(reason: "timeout" | "transport" | "malformed", message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "LlmCallError";
		this.reason = reason;
	}
}

const GenerateResponseSchema = z.object({
	response: z.string(),
	done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
	models: z.array(z.object({ name: z.string() })).default([]),
});

const PING_TIMEOUT_MS = 10_000;

/** Client for an Ollama-compatible `/api/generate` endpoint. */
export class OllamaClient implements LlmClient {
	constructor(
		private readonly url: string,
		readonly model: string,
	) {}

	async ping(): Promise<void> {
		let body: unknown;
		try {
			const response = await fetch(`${this.url}/api/tags`, {
				signal: AbortSignal.timeout(PING_TIMEOUT_MS),
			});
			if (!response.ok) {
				throw new Error(`status ${response.status}`);
			}
			body = await response.json();
		} catch (error) {
			throw new ResourceUnavailableError("llm", String(error), { cause: error });
		}

		const tags = TagsResponseSchema.safeParse(body);
		if (!tags.success) {
			throw new ResourceUnavailableError("llm", "unexpected /api/tags response");
		}
		const names = tags.data.models.map((model) => model.name);
		const wanted = this.model.includes(":") ? this.model : `${this.model}:latest`;
		if (!names.includes(this.model) && !names.includes(wanted)) {
			throw new ResourceUnavailableError("llm", `model ${this.model} is not available`);
		}
		logger.info("LLM endpoint ready", { model: this.model });
	}

	async complete(prompt: string, temperature: number, timeoutSeconds: number): Promise<string> {
		let response: Response;
		try {
			response = await fetch(`${this.url}/api/generate`, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify({
					model: this.model,
					prompt,
					stream: false,
					format: "json",
					options: { temperature },
				}),
				signal: AbortSignal.timeout(timeoutSeconds * 1000),
			});
		} catch (error) {
			if (isAbortError(error)) {
				throw new LlmCallError("timeout", `no response within ${timeoutSeconds}s`, { cause: error });
			}
			throw new LlmCallError("transport", String(error), { cause: error });
		}

		if (!response.ok) {
			throw new LlmCallError("transport", `llm returned ${response.status}`);
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			if (isAbortError(error)) {
				throw new LlmCallError("timeout", `no response within ${timeoutSeconds}s`, { cause: error });
			}
			throw new LlmCallError("malformed", "llm response body is not JSON", { cause: error });
		}
		const parsed = GenerateResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new LlmCallError("malformed", "llm response has no text");
		}
		return parsed.data.response;
	}
}
