import { ResourceUnavailableError } from "../errors";
import { logger } from "../utils/logger";

export interface SplunkSearchClientOptions {
	apiUrl: string;
	namespace: string;
	token: string;
	timeoutMs: number;
}

export type SplunkRecord = Record<string, unknown>;

function isRecord(value: unknown): value is SplunkRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Extracts result rows from the newline-delimited JSON the export endpoint streams. */
export function parseExportLines(body: string): SplunkRecord[] {
	const results: SplunkRecord[] = [];
	let skipped = 0;
	for (const line of body.split("\n")) {
		const trimmed = line.trim();
		if (trimmed.length === 0) {
			continue;
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(trimmed);
		} catch {
			skipped += 1;
			continue;
		}
		if (!isRecord(parsed)) {
			continue;
		}
		if (isRecord(parsed.result)) {
			results.push(parsed.result);
		} else if (Array.isArray(parsed.results)) {
			results.push(...parsed.results.filter(isRecord));
		}
	}
	if (skipped > 0) {
		logger.debug("Skipped non-JSON export lines", { skipped });
	}
	return results;
}

export class SplunkSearchClient {
	constructor(private readonly options: SplunkSearchClientOptions) {}

	private exportUrl(): string {
		const base = this.options.apiUrl.replace(/\/+$/, "");
		const namespace = this.options.namespace.replace(/^\/+|\/+$/g, "");
		return namespace
			? `${base}/${namespace}/search/jobs/export`
			: `${base}/services/search/jobs/export`;
	}

	async exportSearch(search: string): Promise<SplunkRecord[]> {
		const query = search.trim();
		const searchString =
			query.startsWith("search ") || query.startsWith("|") ? query : `search ${query}`;

		let response: Response;
		try {
			response = await fetch(this.exportUrl(), {
				method: "POST",
				headers: {
					Authorization: `Bearer ${this.options.token}`,
					"Content-Type": "application/x-www-form-urlencoded",
				},
				body: new URLSearchParams({ search: searchString, output_mode: "json" }),
				signal: AbortSignal.timeout(this.options.timeoutMs),
			});
		} catch (error) {
			throw new ResourceUnavailableError("incident source", String(error), {
				cause: error,
			});
		}

		if (response.status !== 200) {
			const text = await response.text().catch(() => "");
			throw new ResourceUnavailableError(
				"incident source",
				`export search returned ${response.status}: ${text.slice(0, 200)}`,
			);
		}

		return parseExportLines(await response.text());
	}
}
